import { describe, it, expect } from 'vitest';
import { getAddress } from 'ethers';
import { loadConfig } from './config.js';
import { ValidationError } from './utils/errorhandler.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      logLevel: 'INFO',
      coreDomainId: 1,
      counterpartDomainId: 5,
      adminAddress: '0x1000000000000000000000000000000000000001',
      relayForwarding: 'fan-out',
    });
  });

  it('reads values from the environment', () => {
    const admin = '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd';
    const config = loadConfig({
      LOG_LEVEL: 'debug',
      CORE_DOMAIN_ID: '10',
      COUNTERPART_DOMAIN_ID: ' 42 ',
      ADMIN_ADDRESS: admin,
      RELAY_FORWARDING: 'primary',
    });

    expect(config).toEqual({
      logLevel: 'DEBUG',
      coreDomainId: 10,
      counterpartDomainId: 42,
      adminAddress: getAddress(admin),
      relayForwarding: 'primary',
    });
  });

  it('ignores an unknown log level', () => {
    expect(loadConfig({ LOG_LEVEL: 'loud' }).logLevel).toBe('INFO');
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ CORE_DOMAIN_ID: 'one' })).toThrow(ValidationError);
    expect(() => loadConfig({ COUNTERPART_DOMAIN_ID: '-5' })).toThrow(ValidationError);
    expect(() => loadConfig({ ADMIN_ADDRESS: '0x1234' })).toThrow(ValidationError);
    expect(() => loadConfig({ RELAY_FORWARDING: 'broadcast' })).toThrow(ValidationError);
  });

  it('rejects mirroring a domain onto itself', () => {
    expect(() => loadConfig({ CORE_DOMAIN_ID: '5' })).toThrow('CORE_DOMAIN_ID and COUNTERPART_DOMAIN_ID must differ');
  });
});

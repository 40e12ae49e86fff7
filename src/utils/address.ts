import { getAddress, isAddress } from 'ethers';
import type { Address } from '../models.js';
import { ValidationError } from './errorhandler.js';

export function toAddress(value: string, field = 'address'): Address {
  if (typeof value !== 'string' || !isAddress(value)) {
    throw new ValidationError(`${field} is not a valid address`, field, value);
  }
  return getAddress(value);
}

export function tryAddress(value: string): Address | null {
  return typeof value === 'string' && isAddress(value) ? getAddress(value) : null;
}

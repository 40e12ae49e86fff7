export const XP_PER_LEVEL = 100;

export function levelForXp(xp: number): number {
  return Math.floor(Math.max(0, xp) / XP_PER_LEVEL) + 1;
}

export function xpToNextLevel(xp: number): number {
  return levelForXp(xp) * XP_PER_LEVEL - xp;
}

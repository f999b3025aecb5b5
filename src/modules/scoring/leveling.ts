/** `floor(sqrt(xp / 100)) + 1`, computed in integers so thresholds are exact. */
export function levelForXp(totalXp: number): number {
  if (!Number.isFinite(totalXp) || totalXp <= 0) return 1;
  return integerSqrt(Math.floor(totalXp / 100)) + 1;
}

/** Smallest XP total that reaches `level`. */
export function xpForLevel(level: number): number {
  const steps = Math.max(0, Math.floor(level) - 1);
  return steps * steps * 100;
}

function integerSqrt(n: number): number {
  let root = Math.floor(Math.sqrt(n));
  while (root * root > n) root -= 1;
  while ((root + 1) * (root + 1) <= n) root += 1;
  return root;
}

export const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

export const easeOutCubic = (t: number): number => {
  const inv = 1 - t;
  return 1 - inv * inv * inv;
};

export const easeInOutCubic = (t: number): number => {
  if (t < 0.5) {
    return 4 * t * t * t;
  }
  const f = -2 * t + 2;
  return 1 - (f * f * f) / 2;
};

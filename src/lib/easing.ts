// Speed profiles. Each maps [0,1] -> [0,1] with zero slope at both ends, so a
// shot starts and stops without a velocity step. smoothstep is the Hermite
// h01 basis (2-point Hermite with zero tangents).

export const EASINGS = ['smoothstep', 'smootherstep', 'sine'] as const;

export type Easing = (typeof EASINGS)[number];

const clamp01 = (t: number) => (t <= 0 ? 0 : t >= 1 ? 1 : t);

export function ease(easing: Easing, t: number): number {
  const x = clamp01(t);
  switch (easing) {
    case 'smoothstep':
      return x * x * (3 - 2 * x);
    case 'smootherstep':
      return x * x * x * (x * (x * 6 - 15) + 10);
    case 'sine':
      return (1 - Math.cos(Math.PI * x)) / 2;
  }
}

export function isEasing(value: string): value is Easing {
  return (EASINGS as readonly string[]).includes(value);
}

export const lerp = (a: number, b: number, t: number): number => a + (b - a) * t;

export type RandomSource = () => number;

export const uniform = (random: RandomSource, min: number, max: number) => min + (max - min) * random();

/** Integer in [min, max], both inclusive. */
export const randomInt = (random: RandomSource, min: number, max: number) =>
  Math.min(max, min + Math.floor(random() * (max - min + 1)));

export const pick = <T>(random: RandomSource, values: readonly [T, ...T[]]): T =>
  values[randomInt(random, 0, values.length - 1)] ?? values[0];

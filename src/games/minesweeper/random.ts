import { create } from 'random-seed';

/** Uniform float in [0, 1). */
export type RandomSource = () => number;

export const createRandom = (seed?: string | number): RandomSource => {
  const generator = create(seed === undefined ? undefined : String(seed));
  return () => generator.random();
};

export const randomInt = (random: RandomSource, maxExclusive: number): number =>
  Math.floor(random() * maxExclusive);

export const shuffleInPlace = <T>(items: T[], random: RandomSource): T[] => {
  // Fisher-Yates
  for (let i = items.length - 1; i > 0; i--) {
    const j = randomInt(random, i + 1);
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
};

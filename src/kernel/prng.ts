import type { Rng } from './types.js';

const MASK_64 = (1n << 64n) - 1n;
const TWO_TO_64 = 1n << 64n;
const MASK_128 = (1n << 128n) - 1n;
const DEFAULT_INCREMENT = 0xda3e39cb94b95bdbn;
const PCG_128_MULTIPLIER = 0x2360ed051fc65da44385df649fccf645n;
const DXSM_MULTIPLIER = 0xda942042e4dd58b5n;
const SEED_MIX = 0x9e3779b97f4a7c15f39cc0605cedc835n;

const mask64 = (value: bigint): bigint => value & MASK_64;
const mask128 = (value: bigint): bigint => value & MASK_128;
const ensureOdd = (value: bigint): bigint => value | 1n;

const requireStateWords = (rng: Rng): [bigint, bigint] => {
  const { algorithm, version, state } = rng.state;
  if (algorithm !== 'pcg-dxsm-128' || version !== 1) {
    throw new RangeError(`Unsupported RNG state contract: ${algorithm}@v${version}`);
  }

  const first = state.at(0);
  const second = state.at(1);
  if (state.length !== 2 || first === undefined || second === undefined) {
    throw new RangeError(`Expected exactly 2 RNG state words, received ${state.length}`);
  }
  return [first, second];
};

const dxsm = (state128: bigint): bigint => {
  const hi = mask64(state128 >> 64n);
  const lo = mask64(state128);

  let word = mask64((hi ^ (hi >> 32n)) * DXSM_MULTIPLIER);
  word = mask64(word ^ (word >> 48n));
  word = mask64(word * ensureOdd(lo));
  return word;
};

export const createRng = (seed: bigint): Rng => {
  const seed128 = mask128(seed);
  return {
    state: {
      algorithm: 'pcg-dxsm-128',
      version: 1,
      state: [mask128(seed128 ^ SEED_MIX), ensureOdd(mask128((seed128 << 1n) ^ DEFAULT_INCREMENT))],
    },
  };
};

export const stepRng = (rng: Rng): readonly [bigint, Rng] => {
  const [lcgState, increment] = requireStateWords(rng);
  const maskedState = mask128(lcgState);
  const maskedIncrement = ensureOdd(mask128(increment));

  return [
    dxsm(maskedState),
    {
      state: {
        algorithm: 'pcg-dxsm-128',
        version: 1,
        state: [mask128(maskedState * PCG_128_MULTIPLIER + maskedIncrement), maskedIncrement],
      },
    },
  ] as const;
};

export const nextInt = (rng: Rng, min: number, max: number): readonly [number, Rng] => {
  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
    throw new RangeError('nextInt bounds must be safe integers');
  }
  if (min > max) {
    throw new RangeError(`nextInt requires min <= max, received min=${min}, max=${max}`);
  }

  const range = BigInt(max) - BigInt(min) + 1n;
  // Rejection sampling keeps the draw unbiased.
  const threshold = TWO_TO_64 - (TWO_TO_64 % range);
  let cursor = rng;

  while (true) {
    const [raw, nextRng] = stepRng(cursor);
    cursor = nextRng;
    if (raw < threshold) {
      return [Number(BigInt(min) + (raw % range)), cursor] as const;
    }
  }
};

export const pickOne = <T>(rng: Rng, items: readonly T[]): readonly [T, Rng] => {
  if (items.length === 0) {
    throw new RangeError('pickOne requires at least one item');
  }
  const [index, nextRng] = nextInt(rng, 0, items.length - 1);
  const item = items[index];
  if (item === undefined) {
    throw new RangeError(`pickOne index ${index} out of range`);
  }
  return [item, nextRng] as const;
};

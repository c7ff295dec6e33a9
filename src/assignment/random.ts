/**
 * Source of randomness for the balancer. Passed explicitly so a run can be
 * reproduced from a seed.
 */
export interface Random {
  /** Entero uniforme en [0, maxExclusive) */
  int(maxExclusive: number): number
}

export const systemRandom: Random = {
  int: maxExclusive => Math.floor(Math.random() * maxExclusive),
}

/**
 * mulberry32: generador de 32 bits, suficiente para barajar issues
 */
export function createSeededRandom(seed: number): Random {
  let state = seed >>> 0

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }

  return {
    int: maxExclusive => Math.floor(next() * maxExclusive),
  }
}

export function createRandom(seed?: number): Random {
  return seed === undefined ? systemRandom : createSeededRandom(seed)
}

/**
 * Fisher-Yates sobre una copia; el array original no se toca
 */
export function shuffle<T>(items: readonly T[], random: Random): T[] {
  const shuffled = [...items]
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = random.int(i + 1)
    ;[shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]]
  }
  return shuffled
}

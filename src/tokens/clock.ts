import { randomUUID } from 'node:crypto'

/**
 * Source of the current time and of fresh `jti` values for assertions.
 */
export interface Clock {
  /** Current Unix time in whole seconds */
  nowSeconds: () => number
  newJti: () => string
}

export const systemClock: Clock = {
  nowSeconds: () => Math.floor(Date.now() / 1000),
  newJti: () => randomUUID(),
}

/** Always reports the same instant and jti. */
export const fixedClock = (nowSeconds: number, jti: string): Clock => ({
  nowSeconds: () => nowSeconds,
  newJti: () => jti,
})

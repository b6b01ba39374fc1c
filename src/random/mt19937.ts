/***
 * Mt19937 — 32-bit Mersenne Twister.
 *
 * Standard MT19937 parameters (w=32, n=624, m=397, r=31). State lives in a
 * Uint32Array so every store wraps to 32 bits; intermediate products go
 * through Math.imul to stay exact.
 *
 *   seed 5489  → first output 3499211612, 10000th output 4123659995
 *
 ***/

const STATE_SIZE = 624;
const SHIFT_SIZE = 397;
const MATRIX_A = 0x9908b0df;
const UPPER_MASK = 0x80000000;
const LOWER_MASK = 0x7fffffff;
const INIT_MULTIPLIER = 1812433253;

export const DEFAULT_MT_SEED = 5489;

export class Mt19937 {
  private readonly _mt = new Uint32Array(STATE_SIZE);
  private _index = STATE_SIZE;

  constructor(seed = DEFAULT_MT_SEED) {
    this.seed(seed);
  }

  seed(seed: number): void {
    const mt = this._mt;
    mt[0] = seed >>> 0;
    for (let i = 1; i < STATE_SIZE; i++) {
      const prev = mt[i - 1];
      mt[i] = Math.imul(INIT_MULTIPLIER, prev ^ (prev >>> 30)) + i;
    }
    this._index = STATE_SIZE;
  }

  next_u32(): number {
    if (this._index >= STATE_SIZE) this.twist();
    let y = this._mt[this._index++];
    y ^= y >>> 11;
    y ^= (y << 7) & 0x9d2c5680;
    y ^= (y << 15) & 0xefc60000;
    y ^= y >>> 18;
    return y >>> 0;
  }

  private twist(): void {
    const mt = this._mt;
    for (let i = 0; i < STATE_SIZE; i++) {
      const y = (mt[i] & UPPER_MASK) | (mt[(i + 1) % STATE_SIZE] & LOWER_MASK);
      let v = mt[(i + SHIFT_SIZE) % STATE_SIZE] ^ (y >>> 1);
      if ((y & 1) !== 0) v ^= MATRIX_A;
      mt[i] = v;
    }
    this._index = 0;
  }
}

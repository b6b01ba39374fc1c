/***
 * KeySource — reproducible stream of unsigned 64-bit keys.
 *
 * Each key takes two consecutive generator outputs, the first becoming
 * the high word. Keys are exposed as a (hi, lo) pair of uint32 words
 * instead of a BigInt so the maps can store them in Uint32Array columns.
 *
 * draw() overwrites hi/lo in place; read them before the next draw.
 *
 ***/

import { Mt19937 } from "./mt19937";

export class KeySource {
  private readonly _gen: Mt19937;
  private _hi = 0;
  private _lo = 0;

  constructor(seed: number) {
    this._gen = new Mt19937(seed);
  }

  get hi(): number {
    return this._hi;
  }

  get lo(): number {
    return this._lo;
  }

  reseed(seed: number): void {
    this._gen.seed(seed);
    this._hi = 0;
    this._lo = 0;
  }

  draw(): void {
    this._hi = this._gen.next_u32();
    this._lo = this._gen.next_u32();
  }
}

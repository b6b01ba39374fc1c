/***
 * QuadraticProber — triangular-number probe sequence over a power-of-two table.
 *
 * Starting from a home position, each next() call advances by one more
 * than the previous step:
 *
 *   pos_0 = home
 *   pos_k = (pos_{k-1} + k) & mask       →  home + k(k+1)/2 (mod size)
 *
 * For size = 2^n the triangular numbers cover every residue, so the first
 * `mask + 1` positions are a permutation of 0..mask. next() reports
 * false once that cycle has been used up; callers treat it as "every
 * group has been visited".
 *
 * The mask is not checked here; tables validate it once on construction.
 *
 ***/

export class QuadraticProber {
  private _pos: number;
  private _step = 0;

  constructor(pos: number) {
    this._pos = pos;
  }

  get(): number {
    return this._pos;
  }

  /** Move to the next candidate. Returns false once all mask + 1 positions have been produced. */
  next(mask: number): boolean {
    this._step += 1;
    this._pos = (this._pos + this._step) & mask;
    return this._step <= mask;
  }
}

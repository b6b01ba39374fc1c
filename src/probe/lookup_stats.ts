/** Probe cost of one or more lookups. Hops count probe advances, cmps count key comparisons. */
export class LookupStats {
  hops = 0;
  cmps = 0;

  add(other: LookupStats): this {
    this.hops += other.hops;
    this.cmps += other.cmps;
    return this;
  }

  reset(): void {
    this.hops = 0;
    this.cmps = 0;
  }
}

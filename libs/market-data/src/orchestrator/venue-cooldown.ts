/** Client-side back-off for one venue after it signalled rate limiting. */
export class VenueCooldown {
  private until: number | null = null;

  trip(durationMs: number, now: number): void {
    const candidate = now + Math.max(0, durationMs);
    this.until = this.until === null ? candidate : Math.max(this.until, candidate);
  }

  isActive(now: number): boolean {
    return this.until !== null && now < this.until;
  }

  coolingUntil(now: number): number | null {
    return this.isActive(now) ? this.until : null;
  }
}

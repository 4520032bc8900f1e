/**
 * Counts in-flight uses of each profile so deletion can be refused while
 * a generation or batch still needs it.
 */
export class ProfileUsageTracker {
  private readonly uses = new Map<string, number>();

  /**
   * Marks the profile as in use. Call the returned function exactly once to release it.
   */
  acquire(profileId: string): () => void {
    this.uses.set(profileId, this.activeUses(profileId) + 1);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const remaining = this.activeUses(profileId) - 1;
      if (remaining > 0) {
        this.uses.set(profileId, remaining);
      } else {
        this.uses.delete(profileId);
      }
    };
  }

  activeUses(profileId: string): number {
    return this.uses.get(profileId) ?? 0;
  }

  isBusy(profileId: string): boolean {
    return this.activeUses(profileId) > 0;
  }
}

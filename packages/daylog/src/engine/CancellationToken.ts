/**
 * One-way cancellation flag. The caller writes it, the batch driver polls it
 * once per date.
 */
export class CancellationToken {
  private requested = false;

  cancel(): void {
    this.requested = true;
  }

  /** Predicate form, for APIs that take `() => boolean`. */
  readonly isCancelled = (): boolean => this.requested;
}

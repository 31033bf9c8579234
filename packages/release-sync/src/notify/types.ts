/**
 * Outbound status channel.
 *
 * Implementations deliver best-effort: failures are logged inside the
 * notifier and notify() always resolves.
 */
export interface Notifier {
  notify(text: string): Promise<void>;
}

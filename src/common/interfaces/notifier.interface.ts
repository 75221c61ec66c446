/**
 * Outbound notification channel. `send` rejects with NotificationError on
 * delivery failure and never retries.
 */
export interface INotifier {
  send(text: string): Promise<void>;

  /** Startup connectivity probe. */
  testConnection(): Promise<void>;

  isConfigured(): boolean;
}

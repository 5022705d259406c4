/**
 * Human-readable status surface (tray notification, status line, etc.).
 * The orchestrator pushes a short status string on every state entry and on
 * warning-level anomalies.
 */
export interface NotificationSink {
  update(status: string): void;
}

export const noopNotificationSink: NotificationSink = {
  update: () => {},
};

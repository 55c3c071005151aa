/** External name of the resolved-notification flag shared by every receiver type. */
export const SEND_RESOLVED_FIELD = "send_resolved";

/** Options common to every notifier configuration. */
export type NotifierConfig = {
  readonly sendResolved: boolean;
};

/** Implemented by every concrete receiver configuration. */
export interface Notifier {
  /** Whether the receiver also wants a notification once an alert resolves. */
  sendResolved(): boolean;
}

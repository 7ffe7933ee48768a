/** Step identifiers the remote engine sends for the default handlers. */
export const StepIds = {
  WEB_VIEW: 'WEB_VIEW',
  IDENTITY_VERIFICATION: 'IDENTITY_VERIFICATION',
  TRANSACTION_SIGNING: 'TRANSACTION_SIGNING',
} as const;

export type StepId = (typeof StepIds)[keyof typeof StepIds];

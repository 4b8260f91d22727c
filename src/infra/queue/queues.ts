/**
 * Uses hyphen-only names because BullMQ uses colon as an internal Redis key separator.
 */
export const RUN_QUEUE_NAME = "rsi-run";
export const RUN_JOB_NAME = "rsi-run";
export const RUN_SCHEDULER_ID = "rsi-daily-run";

export const settings = {
  window: {
    minutesBefore: 5,
    minutesAfter: 5,
    triageSeverityFloor: "WARNING",
    collectSeverityFloor: "DEFAULT",
    errorsOnlySeverityFloor: "ERROR",
  },
  collection: {
    triageMaxEntries: 1000,
    collectMaxEntries: 10000,
    pageSize: 500,
    retryAttempts: 4,
    retryBaseDelayMs: 200,
  },
  analysis: {
    timelineBuckets: 20,
    minBucketWidthMs: 60_000,
    samplesPerGroup: 3,
  },
} as const;

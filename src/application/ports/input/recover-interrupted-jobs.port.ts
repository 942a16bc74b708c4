export interface RecoverInterruptedJobsResult {
  recoveredJobIds: string[];
}

/**
 * Recover Interrupted Jobs Port (Driving Port / Use Case Interface)
 * Fails records left in processing by a previous run of the service
 */
export interface RecoverInterruptedJobsPort {
  execute(): Promise<RecoverInterruptedJobsResult>;
}

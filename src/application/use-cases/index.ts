/**
 * Use Cases Barrel Export
 */
export { SubmitSigningJobUseCase } from './submit-signing-job.use-case';
export { ProcessSigningJobUseCase } from './process-signing-job.use-case';
export { GetSigningJobUseCase } from './get-signing-job.use-case';
export { GetSignedArtifactUseCase } from './get-signed-artifact.use-case';
export { CheckDependenciesUseCase } from './check-dependencies.use-case';
export {
  RecoverInterruptedJobsUseCase,
  INTERRUPTED_DETAIL,
} from './recover-interrupted-jobs.use-case';

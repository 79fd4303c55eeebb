export { CancellationController, buildPartialReport } from './cancellation_controller';
export type {
  CancellationActor,
  CancellationInfo,
  ProgressSnapshot,
  PartialReport,
  CancellationControllerDependencies,
  ICancellationController,
} from './cancellation.types';

export { createPoller } from './poller';
export { createCycleReader, readCycle, initialStats } from './helpers';
export type {
  PollerState,
  StepOutcome,
  PollerStats,
  PollerConfig,
  SleepFn,
  PollerDependencies,
  CycleReadings,
  CycleReader,
  Poller
} from './types';

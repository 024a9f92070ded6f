/**
 * Engine module: date handling, element resolution, login, navigation,
 * submission and the batch loop.
 */

export {
  // Schemas
  LocatorStrategySchema,
  LocatorCandidateSchema,
  CandidateListSchema,
  MarkerSetSchema,

  // Types
  type LocatorStrategy,
  type LocatorCandidate,
  type MarkerSet,
  type Credentials,
  type EntrySpec,
  type ContentGenerator,
  type SubmissionOutcome,
  type AuthOutcome,
  type NavigationStrategy,
  type NavigationOutcome,
  type RunState,
  type DayRecord,
  type BatchResult,
  type ProgressSink,
  type ProgressEvent,

  // Helpers
  passThroughContent,
  isCountedSuccess,
} from './types';

export {
  ERA_OFFSET,
  parseIsoDate,
  formatIsoDate,
  toDomesticEra,
  generateDates,
  type CalendarDate,
} from './calendar';

export {
  DaylogError,
  ResolutionTimeoutError,
  AuthFailureError,
  NavigationFailureError,
  EnvironmentFaultError,
  InvalidDateError,
  errorMessage,
  type DaylogErrorCode,
} from './errors';

export {
  LocatorResolver,
  describeCandidate,
  type ResolveResult,
  type ResolveOptions,
  type LocatorResolverOptions,
} from './LocatorResolver';
export { createMarkerClassifier, containsAny, type Verdict, type Classification, type OutcomeClassifier } from './OutcomeClassifier';
export { withFrame, findInFrames } from './frameScope';
export { SessionController, type SessionControllerOptions } from './SessionController';
export { PageNavigator, entryFormUrls, type PageNavigatorOptions } from './PageNavigator';
export { EntrySubmitter, type EntrySubmitterOptions } from './EntrySubmitter';
export { CancellationToken } from './CancellationToken';
export {
  BatchDriver,
  startBatch,
  type BatchDriverOptions,
  type BatchDriverEvents,
  type BatchRunInput,
  type BatchHandle,
  type BatchComponents,
  type ComponentFactory,
  type Authenticator,
  type FormNavigator,
  type Submitter,
} from './BatchDriver';

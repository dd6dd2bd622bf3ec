export { buildLayoutTransition, totalDuration } from './transition-planner';
export { buildInputGeometry, buildMiddleGeometry, buildOutputGeometry } from './geometry-builders';
export { computeTransitionPredicates, isHidingSidebar, isShowingSidebar } from './predicates';
export type {
  AnimationDurations,
  BuildTransitionInput,
  LayoutOperation,
  LayoutOperationName,
  LayoutTransition,
  TimingName,
  TransitionContext,
  TransitionPredicates,
} from './types';

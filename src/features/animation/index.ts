export { AnimationPipeline, createTimerDriver, immediateDriver } from './animation-pipeline';
export type { AnimationDriver, AnimationPipelineOptions, AnimationTask } from './animation-pipeline';
export { TicketCounter } from './ticket-counter';

export { SinkWorker } from "./SinkWorker";
export type { SinkWorkerConfig } from "./SinkWorker";
export { StatusLogWorker, INDICATOR_COLORS } from "./StatusLogWorker";
export type { IndicatorColor } from "./StatusLogWorker";
export { CommandLogWorker, slideAction } from "./CommandLogWorker";
export type { SlideAction } from "./CommandLogWorker";

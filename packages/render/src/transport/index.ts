export { OutputPump, type OutputPumpMetrics, type WritableTarget } from './output-pump.js';
export type { ByteSink } from './byte-sink.js';

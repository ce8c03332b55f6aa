export { ConcurrencyGate } from './utils/concurrency-gate';
export { systemClock, type Clock } from './utils/clock';

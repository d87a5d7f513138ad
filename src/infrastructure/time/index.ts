export { systemClock, sleep } from './clock';
export type { Clock, Sleeper } from './clock';

export { FixedIntervalScheduler, validateIntervals } from './fixed-interval-scheduler';

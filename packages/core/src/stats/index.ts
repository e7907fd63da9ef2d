export { StatsAggregator, STATS_KEY, completionRate, calendarDay, emptyStats } from './stats-aggregator.js';
export type { StatsAggregatorOptions } from './stats-aggregator.js';

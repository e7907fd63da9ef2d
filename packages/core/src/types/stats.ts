import type { Priority } from './priority.js';

export interface TaskStats {
  readonly total: number;
  readonly completed: number;
  readonly pending: number;
  /** Percentage in [0, 100], two decimals; 0 when there are no tasks */
  readonly completionRate: number;
  readonly priorityBreakdown: Record<Priority, number>;
  readonly createdToday: number;
  readonly generatedAt: string;
  /** Set when the store could not be read and the numbers are placeholders */
  readonly degraded?: boolean;
}

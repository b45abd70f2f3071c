export interface TaskStatistics {
  readonly total: number;
  readonly completed: number;
  readonly remaining: number;
}

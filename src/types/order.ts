import type { RunnerLabel } from './stack.js';

export interface StackOrderRecord {
  directory: string;
  runner_label: RunnerLabel;
  planned_changes: boolean;
  order: number;
  skip_when_destroying: boolean;
}

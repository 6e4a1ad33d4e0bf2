import type { JobStage } from './Job.js';

export interface ProgressSnapshot {
  readonly currentStage: JobStage;
  readonly stagesCompleted: readonly JobStage[];
  readonly completedStages: number;
  readonly totalStages: number;
  readonly percentage: number;
  readonly currentOperation: string;
  readonly lastUpdated: Date;
}

export const TOTAL_STAGES = 7;

/**
 * Tracks which pipeline stages a single execution has reached.
 *
 * A stage counts as reached the first time it is reported, so the percentage
 * moves in steps of 1/7. It never goes down for the lifetime of a tracker;
 * a new execution gets a new tracker.
 */
export class ProgressTracker {
  private stage: JobStage = 'initialization';
  private readonly reached: JobStage[] = [];
  private percent = 0;
  private operation = '';
  private updatedAt = new Date();

  constructor(readonly totalStages: number = TOTAL_STAGES) {}

  get currentStage(): JobStage {
    return this.stage;
  }

  get stagesCompleted(): readonly JobStage[] {
    return this.reached;
  }

  get completedStages(): number {
    return this.reached.length;
  }

  get percentage(): number {
    return this.percent;
  }

  get currentOperation(): string {
    return this.operation;
  }

  get lastUpdated(): Date {
    return this.updatedAt;
  }

  update(stage: JobStage, operation: string = ''): void {
    this.stage = stage;
    this.operation = operation;
    if (!this.reached.includes(stage)) {
      this.reached.push(stage);
    }
    this.percent = Math.max(this.percent, (this.reached.length / this.totalStages) * 100);
    this.updatedAt = new Date();
  }

  complete(): void {
    this.percent = 100;
    this.updatedAt = new Date();
  }

  snapshot(): ProgressSnapshot {
    return {
      currentStage: this.stage,
      stagesCompleted: [...this.reached],
      completedStages: this.reached.length,
      totalStages: this.totalStages,
      percentage: this.percent,
      currentOperation: this.operation,
      lastUpdated: new Date(this.updatedAt.getTime()),
    };
  }

  /**
   * Rebuild a tracker from persisted state
   */
  static restore(snapshot: ProgressSnapshot): ProgressTracker {
    const tracker = new ProgressTracker(snapshot.totalStages);
    for (const stage of snapshot.stagesCompleted) {
      tracker.update(stage);
    }
    tracker.stage = snapshot.currentStage;
    tracker.operation = snapshot.currentOperation;
    tracker.percent = Math.max(tracker.percent, snapshot.percentage);
    tracker.updatedAt = new Date(snapshot.lastUpdated.getTime());
    return tracker;
  }
}

import { JobStage, STAGE_ORDER } from '../core/entities/Job.js';

/**
 * Text progress bar, e.g. "[█████░░░░░] 50.0%"
 */
export function progressBar(percentage: number, width: number = 50): string {
  const clamped = Math.min(100, Math.max(0, percentage));
  const filled = Math.floor((width * clamped) / 100);
  return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}] ${clamped.toFixed(1)}%`;
}

/**
 * One symbol per stage: ▶ current, ✓ reached, ○ not reached. Once the job
 * has finished no stage is current.
 */
export function stageIndicator(
  stagesCompleted: readonly string[],
  currentStage: string,
  finished: boolean = false
): string {
  return STAGE_ORDER.map((stage: JobStage) => {
    if (stage === currentStage && !finished) return '▶';
    if (stagesCompleted.includes(stage)) return '✓';
    return '○';
  }).join(' ');
}

export function formatElapsed(seconds: number): string {
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${(seconds % 60).toFixed(1)}s`;
}

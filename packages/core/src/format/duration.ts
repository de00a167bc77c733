import type { GameSummary } from '../models';

/** `125` → `2m5s`, or `2 minutes, 5 seconds` when not concise. */
export function formatDuration(seconds: number, concise = true): string {
  const whole = Math.max(0, Math.floor(seconds));
  if (whole < 60) {
    return concise ? `${whole}s` : `${whole} seconds`;
  }
  const minutes = Math.floor(whole / 60);
  const rest = whole % 60;
  return concise ? `${minutes}m${rest}s` : `${minutes} minutes, ${rest} seconds`;
}

export function describeSummary(summary: GameSummary): string[] {
  if (summary.lifecycle === 'not_started') {
    return ['Game is not yet started.'];
  }

  const lines: string[] = [];
  if (summary.lifecycle === 'in_progress') {
    lines.push(
      summary.branch
        ? `Game in progress. Level:${summary.level} Branch:${summary.branch}`
        : `Game in progress. Level:${summary.level}`,
    );
    lines.push(`Total time elapsed: ${formatDuration(summary.totalElapsed)}`);
  } else {
    lines.push('Game successfully finished.');
    lines.push(`Total time played: ${formatDuration(summary.totalElapsed)}`);
  }

  if (summary.levelLog.length > 0) {
    lines.push(`Levels traversed: ${summary.levelLog.join(' ')}`);
  }

  const loaded = summary.timings.filter((timing) => timing.loadTime !== undefined);
  if (loaded.length > 0) {
    lines.push('Loading times:');
    loaded.forEach((timing) => {
      const prefix = timing.setup ? 'Setup + ' : '';
      lines.push(`${prefix}${timing.level}: ${formatDuration(timing.loadTime ?? 0)}`);
    });
  }

  const solved = summary.timings.filter((timing) => timing.solvingTime !== undefined);
  if (solved.length > 0) {
    lines.push('Solving times:');
    solved.forEach((timing) => {
      lines.push(`${timing.level}: ${formatDuration(timing.solvingTime ?? 0)}`);
    });
  }

  return lines;
}

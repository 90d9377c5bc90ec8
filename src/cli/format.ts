const BAR_WIDTH = 40;

export function formatProgressBar(current: number, total: number, resuming: boolean): string {
  const percent = Math.min(100, Math.floor((current * 100) / Math.max(1, total)));
  const filled = Math.floor((percent * BAR_WIDTH) / 100);
  const bar = '='.repeat(filled) + '-'.repeat(BAR_WIDTH - filled);
  const prefix = resuming ? '[RESUMING] ' : '';
  return `${prefix}[${bar}] ${percent}% (${current}/${total} frames)`;
}

export function formatTime(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  if (hours > 0) {
    return `${hours}h ${minutes}m ${secs}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${secs}s`;
  } else {
    return `${secs}s`;
  }
}

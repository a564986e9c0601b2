const SIZE_UNITS = ['KB', 'MB', 'GB', 'TB'];

/**
 * Percentage of `done` against `total`, clamped to 0–100
 */
export const formatPercents = (done: number, total: number): string => {
  if (!Number.isFinite(total) || total <= 0) {
    return '0%';
  }
  const percents = Math.floor((done / total) * 100);
  return `${Math.min(100, Math.max(0, percents))}%`;
};

export const formatSize = (bytes: number): string => {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return `${value.toFixed(1)} ${SIZE_UNITS[unit]}`;
};

export const formatDate = (date: Date): string => date.toISOString().slice(0, 10);

/**
 * Process memory statistics
 */

import * as v8 from 'v8';

const MB = 1024 * 1024;

export interface MemoryUsage {
  usedMb: number;
  freeMb: number;
  totalMb: number;
  maxMb: number;
}

/**
 * Heap usage in whole megabytes
 */
export function getMemoryUsage(): MemoryUsage {
  const { heapUsed, heapTotal } = process.memoryUsage();
  const { heap_size_limit } = v8.getHeapStatistics();

  return {
    usedMb: Math.floor(heapUsed / MB),
    freeMb: Math.floor(Math.max(0, heapTotal - heapUsed) / MB),
    totalMb: Math.floor(heapTotal / MB),
    maxMb: Math.floor(heap_size_limit / MB),
  };
}

export function formatMemoryUsage(usage: MemoryUsage): string {
  return `Memory Usage: Used=${usage.usedMb} MB, Free=${usage.freeMb} MB, Total=${usage.totalMb} MB, Max=${usage.maxMb} MB`;
}

export function getMemoryUsageStats(): string {
  return formatMemoryUsage(getMemoryUsage());
}

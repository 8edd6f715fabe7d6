// Utility: In-memory counters for mutation and delivery outcomes
// Exposed on /health; swap for a real metrics backend behind the same names

export class Metrics {
  private counters: Map<string, number> = new Map();

  increment(name: string, value = 1): void {
    const current = this.counters.get(name) || 0;
    this.counters.set(name, current + value);
  }

  getCounter(name: string): number {
    return this.counters.get(name) || 0;
  }

  getAll(): Record<string, number> {
    return Object.fromEntries(this.counters);
  }

  reset(): void {
    this.counters.clear();
  }
}

export const metrics = new Metrics();

export const METRICS = {
  MUTATION_COMMITTED: 'mutations.committed',
  MUTATION_FAILED: 'mutations.failed',
  NOTIFICATION_PUBLISHED: 'notifications.published',
  NOTIFICATION_FAILED: 'notifications.failed',
} as const;

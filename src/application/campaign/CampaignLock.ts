// Application layer: Per-campaign exclusive execution
// Tasks for one campaign run strictly one after another; different campaigns never wait on each other.

export class CampaignLock {
  private tails: Map<string, Promise<void>> = new Map();

  /**
   * Queue `task` behind everything already queued for `campaignId`.
   * A failing task rejects its own promise only; the queue keeps going.
   */
  run<T>(campaignId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(campaignId) ?? Promise.resolve();
    const result = previous.then(task);

    const tail: Promise<void> = result.then(settle, settle).then(() => {
      if (this.tails.get(campaignId) === tail) {
        this.tails.delete(campaignId);
      }
    });
    this.tails.set(campaignId, tail);

    return result;
  }

  /** Campaigns with a task queued or running */
  get activeCampaigns(): number {
    return this.tails.size;
  }
}

function settle(): void {}

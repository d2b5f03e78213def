'use strict';

import { errorMessage } from './errors';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import type { Snapshot, Transition } from './types';

export type TransitionListener = (identity: string, oldOnline: boolean, newOnline: boolean) => void | Promise<void>;

export type SnapshotListener = (snapshot: Snapshot) => void;

export function createEmptySnapshot(): Snapshot {
  return {
    cycle: 0,
    publishedAt: null,
    devices: [],
    router: null,
    lastSuccessfulPoll: {
      devices: null,
      counters: null,
      status: null,
    },
  };
}

function copySnapshot(snapshot: Snapshot): Snapshot {
  return {
    ...snapshot,
    devices: snapshot.devices.map((device) => ({ ...device, macs: [...device.macs] })),
    router: snapshot.router ? { ...snapshot.router } : null,
    lastSuccessfulPoll: { ...snapshot.lastSuccessfulPoll },
  };
}

export class SnapshotPublisher {

  private current: Snapshot = createEmptySnapshot();

  private readonly transitionListeners = new Set<TransitionListener>();

  private readonly snapshotListeners = new Set<SnapshotListener>();

  constructor(private readonly logger: Logger = silentLogger) {}

  getSnapshot(): Snapshot {
    return copySnapshot(this.current);
  }

  onTransition(listener: TransitionListener): () => void {
    this.transitionListeners.add(listener);
    return () => {
      this.transitionListeners.delete(listener);
    };
  }

  onSnapshot(listener: SnapshotListener): () => void {
    this.snapshotListeners.add(listener);
    return () => {
      this.snapshotListeners.delete(listener);
    };
  }

  /**
   * Replaces the published snapshot, then notifies listeners. Transitions
   * are delivered one at a time in identity order; a failing listener is
   * logged and does not stop the others.
   */
  async publish(snapshot: Snapshot, transitions: Transition[]): Promise<void> {
    this.current = copySnapshot(snapshot);

    for (const listener of this.snapshotListeners) {
      try {
        listener(this.getSnapshot());
      } catch (error) {
        this.logger.error('Snapshot listener failed:', errorMessage(error));
      }
    }

    const ordered = [...transitions].sort((a, b) => {
      if (a.identity === b.identity) {
        return 0;
      }
      return a.identity < b.identity ? -1 : 1;
    });

    for (const transition of ordered) {
      for (const listener of this.transitionListeners) {
        try {
          await listener(transition.identity, transition.oldOnline, transition.newOnline);
        } catch (error) {
          this.logger.error(`Transition listener failed for ${transition.identity}:`, errorMessage(error));
        }
      }
    }
  }

}

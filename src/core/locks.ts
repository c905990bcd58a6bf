import { InteractionBusyError } from '../utils/errors';

interface Waiter {
  granted: boolean;
  ready: Promise<void>;
  grant: () => void;
}

interface Claim {
  key: string;
  waiter: Waiter;
}

export type ReleaseLocks = () => void;

/**
 * Per-character mutual exclusion for the interaction processor.
 *
 * A caller joins the FIFO queue of every key it needs in one synchronous pass,
 * so grants follow arrival order across keys and no two callers can wait on
 * each other in a cycle. The head of each queue is its current holder. One
 * deadline covers the whole acquisition.
 */
export class CharacterLockManager {
  private queues: Map<string, Waiter[]> = new Map();

  isLocked(id: string): boolean {
    return this.queues.has(id);
  }

  async acquire(ids: string[], timeoutMs: number): Promise<ReleaseLocks> {
    const claims: Claim[] = Array.from(new Set(ids))
      .sort()
      .map(key => ({ key, waiter: this.enqueue(key) }));

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const blocked = claims.find(claim => !claim.waiter.granted);
        reject(new InteractionBusyError(blocked ? blocked.key : claims[0].key, timeoutMs));
      }, timeoutMs);
    });

    try {
      await Promise.race([Promise.all(claims.map(claim => claim.waiter.ready)), deadline]);
    } catch (error) {
      claims.forEach(claim => this.leave(claim));
      throw error;
    } finally {
      clearTimeout(timer);
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      claims.forEach(claim => this.leave(claim));
    };
  }

  private enqueue(key: string): Waiter {
    let resolve_ready: () => void = () => undefined;
    const ready = new Promise<void>(resolve => {
      resolve_ready = resolve;
    });

    const waiter: Waiter = {
      granted: false,
      ready,
      grant: () => {
        waiter.granted = true;
        resolve_ready();
      }
    };

    const queue = this.queues.get(key) ?? [];
    queue.push(waiter);
    this.queues.set(key, queue);
    if (queue.length === 1) waiter.grant();

    return waiter;
  }

  // Drops a holder or a waiter; the next in line is granted when the head leaves
  private leave({ key, waiter }: Claim): void {
    const queue = this.queues.get(key);
    if (!queue) return;

    const index = queue.indexOf(waiter);
    if (index < 0) return;
    queue.splice(index, 1);

    const next = queue[0];
    if (!next) {
      this.queues.delete(key);
    } else if (index === 0 && !next.granted) {
      next.grant();
    }
  }
}

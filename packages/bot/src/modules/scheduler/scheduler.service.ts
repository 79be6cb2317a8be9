import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ClockService } from './clock.service';

export interface TimerHandle {
  readonly id: number;
  readonly label: string;
  readonly dueAt: number;
}

export class SchedulingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchedulingError';
  }
}

/**
 * Rappels différés annulables. Le callback est synchrone : il doit lui-même
 * repasser par la file de sérialisation de la session avant de toucher à l'état.
 */
@Injectable()
export class SchedulerService implements OnModuleDestroy {
  private readonly logger = new Logger(SchedulerService.name);
  private timers = new Map<number, NodeJS.Timeout>();
  private nextId = 1;

  constructor(private readonly clock: ClockService) {}

  after(durationMs: number, callback: () => void, label = 'timer'): TimerHandle {
    if (!Number.isFinite(durationMs) || durationMs < 0) {
      throw new SchedulingError(`Invalid delay for ${label}: ${durationMs}`);
    }
    const id = this.nextId++;
    const handle: TimerHandle = { id, label, dueAt: this.clock.now() + durationMs };
    const timer = this.clock.setTimeout(() => {
      this.timers.delete(id);
      try {
        callback();
      } catch (err) {
        this.logger.error(`Timer ${label} callback failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }, durationMs);
    this.timers.set(id, timer);
    return handle;
  }

  /** Retourne false si le timer a déjà expiré ou était déjà annulé */
  cancel(handle: TimerHandle | undefined): boolean {
    if (!handle) return false;
    const timer = this.timers.get(handle.id);
    if (!timer) return false;
    this.clock.clearTimeout(timer);
    this.timers.delete(handle.id);
    return true;
  }

  cancelAll() {
    for (const timer of this.timers.values()) this.clock.clearTimeout(timer);
    this.timers.clear();
  }

  get pending(): number { return this.timers.size; }

  onModuleDestroy() {
    this.cancelAll();
  }
}

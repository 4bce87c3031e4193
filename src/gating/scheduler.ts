export type DeadlineTimerHandle = {
  key: string;
  deadline: string;
  cancel: () => void;
};

export type DeadlineScheduler = {
  arm: (key: string, deadline: string) => DeadlineTimerHandle;
  cancel: (key: string) => boolean;
  has: (key: string) => boolean;
  size: () => number;
  clear: () => void;
};

export type DeadlineSchedulerParams = {
  /** Delivered once per armed deadline, never for a cancelled or replaced one. */
  onTimeout: (key: string, deadline: string) => void;
  now?: () => Date;
};

type TimerEntry = {
  deadline: string;
  deadlineMs: number;
  timer?: ReturnType<typeof setTimeout>;
};

// setTimeout overflows above 2^31-1 ms and fires immediately.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function createDeadlineScheduler(params: DeadlineSchedulerParams): DeadlineScheduler {
  const now = params.now ?? (() => new Date());
  const timers = new Map<string, TimerEntry>();

  function cancel(key: string): boolean {
    const entry = timers.get(key);
    if (!entry) {
      return false;
    }
    clearTimeout(entry.timer);
    timers.delete(key);
    return true;
  }

  function start(key: string, entry: TimerEntry): void {
    const remaining = Math.max(0, entry.deadlineMs - now().getTime());
    entry.timer = setTimeout(() => fire(key, entry), Math.min(remaining, MAX_TIMER_DELAY_MS));
  }

  function fire(key: string, entry: TimerEntry): void {
    if (timers.get(key) !== entry) {
      return;
    }
    if (entry.deadlineMs > now().getTime()) {
      start(key, entry);
      return;
    }
    timers.delete(key);
    params.onTimeout(key, entry.deadline);
  }

  function arm(key: string, deadline: string): DeadlineTimerHandle {
    const deadlineMs = Date.parse(deadline);
    if (Number.isNaN(deadlineMs)) {
      throw new Error(`Invalid deadline for ${key}: ${deadline}`);
    }
    cancel(key);
    const entry: TimerEntry = { deadline, deadlineMs };
    timers.set(key, entry);
    start(key, entry);
    return {
      key,
      deadline,
      cancel: () => {
        if (timers.get(key) === entry) {
          cancel(key);
        }
      },
    };
  }

  function clear(): void {
    for (const entry of timers.values()) {
      clearTimeout(entry.timer);
    }
    timers.clear();
  }

  return {
    arm,
    cancel,
    has: (key) => timers.has(key),
    size: () => timers.size,
    clear,
  };
}

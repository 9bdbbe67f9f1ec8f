import { DateTime } from "luxon";
import type { BreakdownOptions, BusinessHoursConfig, StateCategory, StateEvent, TimeBreakdown } from "../models/_types";
import { overlapHours, wallClockHours } from "./businessHours";
import { InputError } from "./errors";

type Frame = {
  category: StateCategory;
  rawState: string | null;
  start: DateTime;
};

type TimedEvent = {
  event: StateEvent;
  at: DateTime;
};

export function emptyBreakdown(): TimeBreakdown {
  return {
    activeHours: 0,
    pausedHours: 0,
    preReopenActiveHours: 0,
    postReopenActiveHours: 0,
    wasReopened: false,
    reopenCount: 0,
    totalHours: 0,
    stateBreakdown: {},
    pausedStateBreakdown: {},
    finalCategory: null,
    isCompleted: false,
    isIgnored: false,
    eventCount: 0,
    lastCompletionAt: null
  };
}

function addTo(target: Map<string, number>, key: string, hours: number) {
  target.set(key, (target.get(key) ?? 0) + hours);
}

/**
 * Single forward pass over one item's state changes. Only the open frames and
 * running totals are kept; a pause sits on top of the frame it interrupted.
 */
export class StateTransitionStack {
  private readonly frames: Frame[] = [];
  private readonly stateHours = new Map<string, number>();
  private readonly pausedStateHours = new Map<string, number>();
  private preReopenActive = 0;
  private postReopenActive = 0;
  private pausedHours = 0;
  private totalHours = 0;
  private inCompletion = false;
  private wasReopened = false;
  private reopenCount = 0;
  private eventCount = 0;
  private finalCategory: StateCategory | null = null;
  private lastCompletionAt: string | null = null;

  constructor(
    private readonly hours: BusinessHoursConfig,
    private readonly windowStart: DateTime | null = null
  ) {}

  get depth(): number {
    return this.frames.length;
  }

  get currentCategory(): StateCategory | null {
    return this.top()?.category ?? null;
  }

  /** Opens the implicit `assigned` frame that precedes the first recorded change. */
  open(at: DateTime) {
    if (this.frames.length) {
      return;
    }
    this.frames.push({ category: "assigned", rawState: null, start: at });
  }

  push(event: StateEvent, at: DateTime) {
    const top = this.top();
    if (top) {
      this.measure(top, at);
    }
    this.eventCount += 1;
    this.finalCategory = event.category;
    this.trackReopen(event);

    const frame: Frame = { category: event.category, rawState: event.rawState, start: at };
    if (event.category === "paused") {
      if (top && top.category !== "paused") {
        this.frames.push(frame);
      } else {
        this.replaceTop(frame);
      }
      return;
    }
    if (top?.category === "paused" && this.frames.length > 1) {
      this.frames.pop();
    }
    this.replaceTop(frame);
  }

  finish(asOf: DateTime): TimeBreakdown {
    const top = this.top();
    if (top && this.finalCategory !== "completion") {
      this.measure(top, asOf);
    }
    return {
      activeHours: this.preReopenActive + this.postReopenActive,
      pausedHours: this.pausedHours,
      preReopenActiveHours: this.preReopenActive,
      postReopenActiveHours: this.postReopenActive,
      wasReopened: this.wasReopened,
      reopenCount: this.reopenCount,
      totalHours: this.totalHours,
      stateBreakdown: Object.fromEntries(this.stateHours),
      pausedStateBreakdown: Object.fromEntries(this.pausedStateHours),
      finalCategory: this.finalCategory,
      isCompleted: this.finalCategory === "completion",
      isIgnored: this.finalCategory === "ignored",
      eventCount: this.eventCount,
      lastCompletionAt: this.lastCompletionAt
    };
  }

  private top(): Frame | undefined {
    return this.frames[this.frames.length - 1];
  }

  private replaceTop(frame: Frame) {
    if (this.frames.length) {
      this.frames[this.frames.length - 1] = frame;
    } else {
      this.frames.push(frame);
    }
  }

  private trackReopen(event: StateEvent) {
    if (event.category === "completion") {
      if (!this.inCompletion) {
        this.lastCompletionAt = event.timestamp;
      }
      this.inCompletion = true;
      return;
    }
    if (event.category === "ignored" || !this.inCompletion) {
      return;
    }
    this.inCompletion = false;
    this.wasReopened = true;
    this.reopenCount += 1;
  }

  private measure(frame: Frame, end: DateTime) {
    const start = this.windowStart && this.windowStart > frame.start ? this.windowStart : frame.start;
    if (end <= start) {
      return;
    }
    const wallHours = wallClockHours(start, end);
    this.totalHours += wallHours;

    if (frame.category === "productive") {
      const activeHours = overlapHours(start, end, this.hours);
      if (this.wasReopened) {
        this.postReopenActive += activeHours;
      } else {
        this.preReopenActive += activeHours;
      }
      if (frame.rawState) {
        addTo(this.stateHours, frame.rawState, activeHours);
      }
      return;
    }
    if (frame.category === "paused") {
      this.pausedHours += wallHours;
      if (frame.rawState) {
        addTo(this.pausedStateHours, frame.rawState, wallHours);
      }
    }
    if (frame.rawState) {
      addTo(this.stateHours, frame.rawState, wallHours);
    }
  }
}

function parseInstant(value: string, label: string): DateTime {
  const parsed = DateTime.fromISO(value, { zone: "utc" });
  if (!parsed.isValid) {
    throw new InputError(`${label} "${value}" is not a valid ISO-8601 timestamp.`);
  }
  return parsed;
}

function toTimedEvents(events: StateEvent[]): TimedEvent[] {
  return events.map((event, index) => {
    if (!event.timestamp) {
      throw new InputError(`State change #${index + 1} (${event.rawState}) is missing a timestamp.`);
    }
    return { event, at: parseInstant(event.timestamp, `State change #${index + 1} timestamp`) };
  });
}

export function accumulate(
  events: StateEvent[],
  config: BusinessHoursConfig,
  options: BreakdownOptions = {}
): TimeBreakdown {
  const asOf = options.asOf ? parseInstant(options.asOf, "asOf") : DateTime.utc();
  const windowStart = options.windowStart ? parseInstant(options.windowStart, "windowStart") : null;
  const createdAt = options.createdAt ? parseInstant(options.createdAt, "createdAt") : null;

  const timed = toTimedEvents(events)
    .sort((a, b) => a.at.toMillis() - b.at.toMillis())
    .filter((entry) => entry.at <= asOf);
  if (!timed.length) {
    return emptyBreakdown();
  }

  const stack = new StateTransitionStack(config, windowStart);
  if (createdAt && createdAt < timed[0].at) {
    stack.open(createdAt);
  }
  for (const { event, at } of timed) {
    stack.push(event, at);
  }
  return stack.finish(asOf);
}

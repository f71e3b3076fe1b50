import { asyncScheduler, SchedulerLike } from 'rxjs';
import type { Flow } from '../flow/flow';
import type { IPlayerOptions } from '../types/flow-options';
import {
  GraphActionResponse,
  GraphActionResult,
  GraphState,
  GraphStateEvent,
} from '../types/graph-state';
import { LoggerManager } from '../utils/logging';
import type { ILogger } from '../types/logger';
import { GraphEvents } from './graph-events';
import { GraphTime } from './graph-time';

export const DEFAULT_FRAMES = 30;

/**
 * Scheduler treating a flow as a running program.
 *
 * Players are attached through `flow.player = player`. While not stopped,
 * the player owns the flow's evaluation.
 */
export abstract class GraphPlayer {
  readonly events = new GraphEvents();
  readonly graphTime: GraphTime;

  protected readonly scheduler: SchedulerLike;
  private boundFlow: Flow | null = null;

  constructor(options: IPlayerOptions = {}) {
    this.graphTime = new GraphTime(options.frames ?? DEFAULT_FRAMES, options.clock);
    this.scheduler = options.scheduler ?? asyncScheduler;
  }

  get flow(): Flow | null {
    return this.boundFlow;
  }

  get state(): GraphState {
    return this.events.state;
  }

  /**
   * Seconds between the last two frames
   */
  get deltaTime(): number {
    return this.graphTime.deltaTime;
  }

  protected get logger(): ILogger {
    return this.boundFlow?.logger ?? LoggerManager.getInstance().getLogger();
  }

  /**
   * Called by `Flow.player`. Detaches from a previous flow first.
   */
  bind(flow: Flow | null): void {
    const previous = this.boundFlow;
    if (previous === flow) {
      return;
    }
    if (previous && previous.player === this) {
      previous.player = null;
    }
    this.boundFlow = flow;
  }

  /**
   * Changes the target frame rate
   * @returns false unless the player is stopped
   */
  setFrames(frames: number): boolean {
    if (this.state !== GraphState.STOPPED) {
      return false;
    }
    this.graphTime.frames = frames;
    return true;
  }

  /** Evaluates the flow, then keeps ticking while frame-driven nodes run */
  abstract play(): GraphActionResult;

  /** Suspends frame ticks */
  abstract pause(): GraphActionResult;

  abstract resume(): GraphActionResult;

  /** Stops at the next tick or pass boundary */
  abstract stop(): GraphActionResult;

  protected setState(newState: GraphState): GraphStateEvent {
    const event = this.events.transition(newState);
    this.logger.logEvent('player', 'stateChanged', {
      flow: this.boundFlow?.title ?? null,
      oldState: event.oldState,
      newState: event.newState,
    });
    return event;
  }

  protected result(response: GraphActionResponse, message: string): GraphActionResult {
    return { response, message };
  }
}

import { BehaviorSubject, filter, firstValueFrom, map, Observable, Subject } from 'rxjs';
import { GraphState, GraphStateEvent } from '../types/graph-state';

/**
 * State-change streams of a graph player
 */
export class GraphEvents {
  private readonly stateSubject = new BehaviorSubject<GraphState>(GraphState.STOPPED);
  private readonly changes = new Subject<GraphStateEvent>();

  get state(): GraphState {
    return this.stateSubject.getValue();
  }

  /**
   * Current state, replayed to new subscribers
   */
  get state$(): Observable<GraphState> {
    return this.stateSubject.asObservable();
  }

  /**
   * Every transition as (old state, new state)
   */
  get stateChanged$(): Observable<GraphStateEvent> {
    return this.changes.asObservable();
  }

  /**
   * Transitions into the given state
   */
  on(state: GraphState): Observable<GraphStateEvent> {
    return this.changes.pipe(filter(event => event.newState === state));
  }

  /**
   * Resolves once the player is stopped, immediately if it already is
   */
  whenStopped(): Promise<void> {
    return firstValueFrom(
      this.stateSubject.pipe(
        filter(state => state === GraphState.STOPPED),
        map(() => undefined)
      )
    );
  }

  /**
   * Moves to a new state and notifies subscribers
   */
  transition(newState: GraphState): GraphStateEvent {
    const event: GraphStateEvent = { oldState: this.state, newState };
    this.stateSubject.next(newState);
    this.changes.next(event);
    return event;
  }

  complete(): void {
    this.stateSubject.complete();
    this.changes.complete();
  }
}

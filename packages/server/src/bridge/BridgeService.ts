import type { FlightRecord, RouteSpec, TelemetrySnapshot } from '@flightbridge/shared';
import type { FlightEvent } from '../engine/FlightTypes.js';
import type { FlightStateMachine } from '../engine/FlightStateMachine.js';
import type { BroadcastHub } from '../hub/BroadcastHub.js';
import type { FlightStore } from '../remote/RestFlightStore.js';
import type { PollerEvent } from '../telemetry/TelemetryPoller.js';

export interface BridgeServiceDeps {
  engine: FlightStateMachine;
  hub: BroadcastHub;
  store: FlightStore;
  /** Extra telemetry sink, e.g. the realtime relay */
  publish?: (snapshot: TelemetrySnapshot) => void;
}

/**
 * Connects the telemetry loop to the flight engine and the viewers.
 * Poller events arrive one at a time, so engine ticks never interleave.
 */
export class BridgeService {
  private userId: string | null = null;
  private sourceConnected = false;
  private pendingSaves = new Set<Promise<boolean>>();

  constructor(private deps: BridgeServiceDeps) {}

  get isSourceConnected(): boolean {
    return this.sourceConnected;
  }

  get currentUserId(): string | null {
    return this.userId;
  }

  /** PollerHandler */
  handlePollerEvent(event: PollerEvent): void {
    switch (event.type) {
      case 'connected':
        this.sourceConnected = true;
        console.log(`[Bridge] Telemetry source connected: ${event.source}`);
        break;

      case 'snapshot':
        this.handleSnapshot(event.snapshot);
        break;

      case 'disconnected': {
        this.sourceConnected = false;
        console.log(`[Bridge] Telemetry source lost: ${event.reason}`);
        this.handleEvents(this.deps.engine.reset());
        this.deps.hub.broadcastStatus();
        break;
      }
    }
  }

  /** Route hint from viewers */
  setRoute(route: RouteSpec): void {
    this.deps.engine.setRoute(route);
  }

  /** Viewer login (nulls on logout). The token only goes to the store. */
  setAuth(userId: string | null, token: string | null): void {
    this.userId = userId;
    this.deps.store.setUserToken(token);
  }

  /** Wait for in-flight saves; used on shutdown */
  async flush(): Promise<void> {
    await Promise.all(this.pendingSaves);
  }

  private handleSnapshot(snapshot: TelemetrySnapshot): void {
    const events = this.deps.engine.update(snapshot);
    this.deps.hub.broadcastTelemetry(snapshot);
    this.deps.publish?.(snapshot);
    this.handleEvents(events);
  }

  private handleEvents(events: FlightEvent[]): void {
    for (const event of events) {
      switch (event.type) {
        case 'baseline':
          console.log(
            `[FlightEngine] Baseline: ${event.onGround ? 'on ground' : 'airborne'}, GS ${event.groundSpeed} kts, ALT ${event.altitude} ft`
          );
          break;
        case 'takeoff':
          console.log(`[FlightEngine] Takeoff (${event.verdict}) at ${event.groundSpeed} kts`);
          break;
        case 'flightStarted':
          console.log(
            `[FlightEngine] Tracking flight from ${event.origin ?? 'unknown'}${event.retroactive ? ' (retroactive)' : ''}`
          );
          break;
        case 'flightValidated':
          console.log(`[FlightEngine] Flight validated at ${event.groundSpeed} kts`);
          break;
        case 'landing':
          this.deps.hub.broadcastLanding(event.landing);
          break;
        case 'landingRejected':
          console.log(`[FlightEngine] Landing ignored: ${event.message}`);
          break;
        case 'flightCompleted':
          this.saveRecord(event.record);
          break;
        case 'flightDiscarded':
          console.log(`[FlightEngine] Flight not logged: ${event.message}`);
          break;
        case 'flightAborted':
          console.log('[FlightEngine] Flight tracking aborted');
          break;
      }
    }
  }

  /** Persistence never holds up the tick */
  private saveRecord(record: FlightRecord): void {
    const tagged: FlightRecord = {
      ...record,
      userId: this.userId,
      sessionCode: this.deps.hub.getSessionCode(),
    };
    console.log(
      `[FlightEngine] Flight complete: ${tagged.origin ?? '----'} -> ${tagged.destination ?? '----'}, ${tagged.distanceNm} NM, score ${tagged.score}`
    );

    const save = this.deps.store
      .save(tagged)
      .catch((e: unknown) => {
        console.error('[Bridge] Flight save failed:', e);
        return false;
      })
      .finally(() => {
        this.pendingSaves.delete(save);
      });
    this.pendingSaves.add(save);
  }
}

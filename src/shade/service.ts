/**
 * Shade Module - Service Layer
 *
 * One controller per shade. It runs three activities against a single
 * owned state object:
 * - cover command listener, feeding a serialized command queue
 * - relay feedback listener, feeding the relay tracker
 * - position ticker, integrating motion time into a position estimate
 *
 * Relay writes, the feedback wait and the state commit of a command run
 * as one unit on the queue; the next command starts only after it.
 */
import { type Result, err, ok } from "neverthrow";
import type { Logger } from "pino";

import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { MessageBus, MessageHandler } from "../mqtt/index.js";
import {
  DIRECTION,
  advancePosition,
  boundaryAt,
  computeIncrement,
  isInterior,
  type Boundary,
  type Direction,
} from "../position/index.js";
import {
  createRelayTracker,
  parseRelayPayload,
  relayPayloadFor,
  type RelayRole,
  type RelayWaitError,
} from "../relays/index.js";
import { shadeTopics } from "../topics/index.js";
import type { ShadeError } from "./errors.js";
import {
  aborted,
  busFailure,
  formatShadeError,
  internalError,
  isFatalShadeError,
  relayNotResponding,
} from "./errors.js";
import type {
  CoverCommand,
  RelayWrite,
  ShadeFault,
  ShadeSettings,
  ShadeSnapshot,
  ShadeState,
} from "./schema.js";
import {
  boundaryPayload,
  directionFor,
  matchesTarget,
  parseCoverCommand,
  planTransition,
  relayWritesFor,
  statePayloadFor,
} from "./transform.js";

const baseLog = createLogger("shade");

export type ShadeController = Readonly<{
  name: string;
  /** Subscribe to the cover command topic and both relay state topics */
  subscribe: () => Promise<Result<void, ShadeError>>;
  /** Subscribe, then run the position ticker until stopped */
  start: () => Promise<Result<void, ShadeError>>;
  /** One estimator step, including a boundary stop when one is due */
  tick: () => Promise<Result<void, ShadeError>>;
  /** Queue a command and wait for it to finish */
  handleCommand: (command: CoverCommand) => Promise<Result<void, ShadeError>>;
  /** Queue a command without waiting; failures are logged or terminate */
  dispatchCommand: (command: CoverCommand) => void;
  handleRelayFeedback: (role: RelayRole, isOn: boolean) => void;
  getSnapshot: () => ShadeSnapshot;
  terminate: (error: ShadeError) => void;
  stop: () => void;
  /** Settles once: ok after stop(), err with the first fatal error */
  done: Promise<Result<void, ShadeError>>;
}>;

export type ShadeControllerDeps = Readonly<{
  settings: ShadeSettings;
  bus: MessageBus;
  log?: Logger;
}>;

/**
 * Create a controller. Nothing is subscribed until subscribe() or start().
 */
export function createShadeController(
  deps: ShadeControllerDeps,
): ShadeController {
  const { settings, bus } = deps;
  const name = settings.name;
  const log = (deps.log ?? baseLog).child({ shade: name });
  const topics = shadeTopics(settings);
  const tracker = createRelayTracker(log);
  const increment = computeIncrement(settings);
  const abort = new AbortController();

  // Shade state; the shade is assumed fully open at startup
  let state: ShadeState = "stopped";
  let direction: Direction = DIRECTION.stopped;
  let position = settings.maxPosition;
  let fault: ShadeFault | null = null;

  let queue: Promise<void> = Promise.resolve();
  let outcome: Result<void, ShadeError> | null = null;
  let settleDone: (result: Result<void, ShadeError>) => void = () => {};
  const done = new Promise<Result<void, ShadeError>>((resolve) => {
    settleDone = resolve;
  });

  // ===========================================================================
  // Bus I/O
  // ===========================================================================

  async function publish(
    topic: string,
    payload: string,
  ): Promise<Result<void, ShadeError>> {
    const result = await bus.publish(topic, payload);
    return result.mapErr((error) => busFailure(name, error));
  }

  function writeRelay(write: RelayWrite): Promise<Result<void, ShadeError>> {
    const topic =
      write.role === "open" ? topics.openRelayCommand : topics.closeRelayCommand;
    const payload = relayPayloadFor(write.on);
    log.info({ relay: write.role, payload }, `Set ${write.role} relay ${payload}`);
    return publish(topic, payload);
  }

  // ===========================================================================
  // State Machine
  // ===========================================================================

  function fromWaitError(
    target: ShadeState,
    error: RelayWaitError,
  ): ShadeError {
    switch (error.type) {
      case "FEEDBACK_TIMEOUT":
        return relayNotResponding(name, target, error.timeoutMs, error.observed);
      case "WAIT_ABORTED":
        return aborted(name);
    }
  }

  /**
   * Drive the relays to a state, wait for feedback to agree, then commit.
   */
  async function transitionTo(
    target: ShadeState,
  ): Promise<Result<void, ShadeError>> {
    if (abort.signal.aborted) return err(aborted(name));

    for (const write of relayWritesFor(target)) {
      const written = await writeRelay(write);
      if (written.isErr()) return written;
    }

    const confirmed = await tracker.waitFor(
      (snapshot) => matchesTarget(snapshot, target),
      { timeoutMs: settings.feedbackTimeoutMs, signal: abort.signal },
    );

    if (confirmed.isErr()) {
      const error = fromWaitError(target, confirmed.error);
      if (error.type === "RELAY_NOT_RESPONDING") {
        fault = {
          type: error.type,
          target,
          timeoutMs: error.timeoutMs,
          observed: error.observed,
          since: Date.now(),
        };
      }
      return err(error);
    }

    const previous = state;
    state = target;
    direction = directionFor(target);
    fault = null;
    log.info(
      { from: previous, to: target, relays: confirmed.value },
      `State ${previous} → ${target}`,
    );

    const payload = statePayloadFor(target);
    return payload ? publish(topics.coverState, payload) : ok(undefined);
  }

  async function executeCommand(
    command: CoverCommand,
  ): Promise<Result<void, ShadeError>> {
    const steps = planTransition(state, command);
    if (steps.length === 0) {
      log.debug({ command, state }, "Already moving in requested direction");
      return ok(undefined);
    }

    const operation = `command ${command}`;
    const startTime = Date.now();
    logOperationStart(log, operation, { from: state, steps });

    for (const target of steps) {
      const result = await transitionTo(target);
      if (result.isErr()) {
        if (result.error.type !== "ABORTED") {
          logOperationFailed(log, operation, formatShadeError(result.error));
        }
        return result;
      }
    }

    logOperationComplete(log, operation, startTime, { state, position });
    return ok(undefined);
  }

  /**
   * Run a task after every previously queued one has finished.
   */
  function serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = queue.then(task);
    queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  function handleCommand(
    command: CoverCommand,
  ): Promise<Result<void, ShadeError>> {
    return serialize(() => executeCommand(command));
  }

  function handleError(error: ShadeError): void {
    if (isFatalShadeError(error)) {
      terminate(error);
      return;
    }
    if (error.type === "ABORTED") {
      log.debug("Operation aborted by shutdown");
      return;
    }
    log.error({ error: formatShadeError(error), fault }, "Relay not responding");
  }

  function dispatchCommand(command: CoverCommand): void {
    void handleCommand(command).then(
      (result) => {
        if (result.isErr()) handleError(result.error);
      },
      (thrown: unknown) => terminate(internalError(name, thrown)),
    );
  }

  // ===========================================================================
  // Position Estimator
  // ===========================================================================

  /**
   * Stop at a boundary through the command queue, then report the final
   * position and open/closed. A command that reversed the shade in the
   * meantime cancels it; one that already stopped the shade does not.
   */
  function stopAtBoundary(
    boundary: Boundary,
    observedState: ShadeState,
  ): Promise<Result<void, ShadeError>> {
    return serialize(async (): Promise<Result<void, ShadeError>> => {
      if (state !== observedState && state !== "stopped") {
        log.debug(
          { boundary, observedState, state },
          "Shade reversed before boundary stop, skipping",
        );
        return ok(undefined);
      }

      if (state === "stopped") {
        log.info({ boundary, position }, `Stopped at ${boundary} boundary`);
      } else {
        log.info({ boundary, position }, `Reached ${boundary} boundary`);
        const stopped = await transitionTo("stopped");
        if (stopped.isErr()) return stopped;
      }

      const positionPublished = await publish(
        topics.coverPosition,
        String(position),
      );
      if (positionPublished.isErr()) return positionPublished;

      return publish(topics.coverState, boundaryPayload(boundary));
    });
  }

  async function tick(): Promise<Result<void, ShadeError>> {
    position = advancePosition(
      position,
      direction,
      increment,
      settings.maxPosition,
    );
    log.trace({ position, direction }, "Tick");

    if (
      direction !== DIRECTION.stopped &&
      isInterior(position, settings.maxPosition)
    ) {
      const published = await publish(topics.coverPosition, String(position));
      if (published.isErr()) return published;
    }

    const boundary = boundaryAt(position, settings.maxPosition);
    if (boundary === null || state === "stopped") return ok(undefined);

    return stopAtBoundary(boundary, state);
  }

  async function runTicker(): Promise<void> {
    log.debug(
      { tickIntervalMs: settings.tickIntervalMs, increment },
      "Start tracking position",
    );
    while (!abort.signal.aborted) {
      const result = await tick();
      if (result.isErr()) handleError(result.error);
      await sleep(settings.tickIntervalMs, abort.signal);
    }
  }

  // ===========================================================================
  // Listeners
  // ===========================================================================

  const onCoverMessage: MessageHandler = (topic, payload) => {
    if (abort.signal.aborted) return;
    log.info({ topic, payload: payload.toString() }, "Cover message");

    const command = parseCoverCommand(payload);
    if (command === null) {
      log.debug({ payload: payload.toString() }, "Ignoring unknown cover command");
      return;
    }
    dispatchCommand(command);
  };

  const relayListener =
    (role: RelayRole): MessageHandler =>
    (topic, payload) => {
      if (abort.signal.aborted) return;
      log.info({ topic, payload: payload.toString() }, "Relay message");

      const isOn = parseRelayPayload(payload);
      if (isOn === null) {
        log.debug({ payload: payload.toString() }, "Ignoring unknown relay state");
        return;
      }
      handleRelayFeedback(role, isOn);
    };

  function handleRelayFeedback(role: RelayRole, isOn: boolean): void {
    tracker.update(role, isOn);
  }

  async function subscribe(): Promise<Result<void, ShadeError>> {
    const subscriptions: ReadonlyArray<readonly [string, MessageHandler]> = [
      [topics.coverCommand, onCoverMessage],
      [topics.openRelayState, relayListener("open")],
      [topics.closeRelayState, relayListener("close")],
    ];

    for (const [topic, handler] of subscriptions) {
      const result = await bus.subscribe(topic, handler);
      if (result.isErr()) return err(busFailure(name, result.error));
    }

    log.info(
      {
        command: topics.coverCommand,
        openRelayState: topics.openRelayState,
        closeRelayState: topics.closeRelayState,
      },
      "Subscribed to shade topics",
    );
    return ok(undefined);
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async function start(): Promise<Result<void, ShadeError>> {
    const subscribed = await subscribe();
    if (subscribed.isErr()) {
      terminate(subscribed.error);
      return subscribed;
    }

    void runTicker().catch((thrown: unknown) => {
      terminate(internalError(name, thrown));
    });
    return ok(undefined);
  }

  function terminate(error: ShadeError): void {
    if (outcome) return;
    outcome = err(error);
    log.fatal({ error: formatShadeError(error) }, "Shade controller failed");
    abort.abort();
    settleDone(outcome);
  }

  function stop(): void {
    if (outcome) return;
    outcome = ok(undefined);
    log.info("Shade controller stopped");
    abort.abort();
    settleDone(outcome);
  }

  function getSnapshot(): ShadeSnapshot {
    return {
      name,
      openRelay: settings.openRelay,
      closeRelay: settings.closeRelay,
      state,
      direction,
      position,
      maxPosition: settings.maxPosition,
      relays: tracker.getSnapshot(),
      fault,
    };
  }

  return {
    name,
    subscribe,
    start,
    tick,
    handleCommand,
    dispatchCommand,
    handleRelayFeedback,
    getSnapshot,
    terminate,
    stop,
    done,
  };
}

/**
 * Resolve after ms, or as soon as the signal aborts.
 */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

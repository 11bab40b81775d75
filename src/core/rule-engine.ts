import type { AttributeLookup, ConditionNode } from '../conditions/condition-node.js';
import { flatten, initializeTree } from '../conditions/tree.js';
import { NOOP_AUDIT, type AuditSink } from '../audit/types.js';
import { describeError, DuplicateError, NotFoundError, TimerError } from '../errors.js';
import type { ConditionTiming } from '../types/condition.js';
import type { DeviceEvent, ExecutionContext } from '../types/device.js';
import type { Duration, TimerEntry } from '../types/timer.js';
import { parseOptionalDuration } from '../utils/duration-parser.js';
import type { Signal } from '../utils/signal.js';
import { AttributeCache } from './attribute-cache.js';
import { DeviceEventRouter } from './device-event-router.js';
import { TimerService } from './timer-service.js';

/** Attribute values the engine initializes trees from and keeps current */
export interface AttributeStore extends AttributeLookup {
  update(event: DeviceEvent): void;
}

export interface RuleEngineConfig {
  /** Name used in log lines and audit entries (default: 'rule-engine') */
  name?: string;
  /** Timer service shared with the coordinator; created when omitted */
  timers?: TimerService;
  /**
   * Values trees are initialized from on registration. Every event is
   * recorded here before it is routed (default: empty cache).
   */
  values?: AttributeStore;
  audit?: AuditSink;
}

/** One-shot latches a registered tree reports through */
export interface ConditionSignals {
  /** Set when the root becomes (and, with `forDuration`, stays) true */
  fired?: Signal;
  /** Set when the timeout elapses first */
  timeout?: Signal;
}

export interface AddConditionOptions extends ConditionTiming {
  /** Rule or scene the tree belongs to, for logs and audit entries */
  context?: ExecutionContext;
}

export interface EngineStats {
  /** Registered root trees */
  conditions: number;
  /** Registered nodes across all trees */
  nodes: number;
  /** Devices with at least one subscribed leaf */
  devices: number;
  eventsProcessed: number;
  fired: number;
  timedOut: number;
  removed: number;
  recomputeFailures: number;
}

type Settlement = 'fired' | 'timed_out' | 'removed';

interface TrackedTree {
  readonly root: ConditionNode;
  readonly nodes: Map<string, ConditionNode>;
  readonly parents: Map<string, ConditionNode>;
  readonly depth: Map<string, number>;
  readonly signals: ConditionSignals;
  readonly forDurationMs: number | undefined;
  readonly context: ExecutionContext;
  timeoutTimer: TimerEntry | undefined;
  durationTimer: TimerEntry | undefined;
  settled: boolean;
}

interface EngineInternals {
  eventsProcessed: number;
  fired: number;
  timedOut: number;
  removed: number;
  recomputeFailures: number;
}

/**
 * Registry of live condition trees.
 *
 * Device events are routed to the leaves that watch the device, changed
 * leaves propagate to their ancestors bottom-up, and a root that becomes
 * true fires its tree. Timeout and duration timers race against that.
 *
 * Every registry mutation and every propagation runs in one serialized
 * section (a promise-chained queue). Signals are set only after the section
 * is left, so a woken waiter never observes a half-updated registry.
 */
export class RuleEngine {
  private readonly name: string;
  private readonly timers: TimerService;
  private readonly ownsTimers: boolean;
  private readonly values: AttributeStore;
  private readonly audit: AuditSink;
  private readonly router = new DeviceEventRouter();

  private readonly trees = new Map<string, TrackedTree>();
  private readonly nodeIndex = new Map<string, TrackedTree>();

  private readonly internals: EngineInternals = {
    eventsProcessed: 0,
    fired: 0,
    timedOut: 0,
    removed: 0,
    recomputeFailures: 0
  };

  private running = false;
  private processingQueue: Promise<void> = Promise.resolve();

  private constructor(config: RuleEngineConfig) {
    this.name = config.name ?? 'rule-engine';
    this.ownsTimers = config.timers === undefined;
    this.timers = config.timers ?? new TimerService();
    this.values = config.values ?? new AttributeCache();
    this.audit = config.audit ?? NOOP_AUDIT;
  }

  /**
   * Creates and starts a new RuleEngine.
   */
  static async start(config: RuleEngineConfig = {}): Promise<RuleEngine> {
    const engine = new RuleEngine(config);
    engine.running = true;

    engine.audit.record('engine_started', { name: engine.name }, { source: engine.name });

    return engine;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                          CONDITION REGISTRY
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Registers a condition tree.
   *
   * The tree is initialized from the engine's attribute values inside the
   * serialized section; nothing is fetched. A root that is already true
   * fires right away, or starts its duration timer.
   *
   * @throws DuplicateError when any node of the tree is already registered
   * @throws TimerError for an invalid timeout or duration
   */
  async addCondition(
    root: ConditionNode,
    signals: ConditionSignals = {},
    options: AddConditionOptions = {}
  ): Promise<void> {
    const timeoutMs = toMilliseconds(options.timeout, 'timeout');
    const forDurationMs = toMilliseconds(options.forDuration, 'forDuration');
    const context = options.context ?? {};

    const deliveries = await this.exclusive(() => {
      this.ensureRunning();

      const nodes = flatten(root);
      const seen = new Set<string>();
      for (const node of nodes) {
        if (this.nodeIndex.has(node.id) || seen.has(node.id)) {
          throw new DuplicateError('condition', node.id);
        }
        seen.add(node.id);
      }

      initializeTree(root, this.values);

      const tree: TrackedTree = {
        root,
        nodes: new Map(nodes.map(node => [node.id, node])),
        parents: new Map(),
        depth: new Map([[root.id, 0]]),
        signals,
        forDurationMs: forDurationMs === 0 ? undefined : forDurationMs,
        context,
        timeoutTimer: undefined,
        durationTimer: undefined,
        settled: false
      };

      // Nodes are in post-order, so walk them reversed to assign depth top-down
      for (const node of [...nodes].reverse()) {
        const depth = tree.depth.get(node.id) ?? 0;
        for (const child of node.children) {
          tree.parents.set(child.id, node);
          tree.depth.set(child.id, depth + 1);
        }
      }

      this.trees.set(root.id, tree);
      for (const node of nodes) {
        this.nodeIndex.set(node.id, tree);
        if (node.isLeaf) {
          for (const deviceId of node.deviceIds) {
            this.router.subscribe(deviceId, node.id);
          }
        }
      }

      this.audit.record('condition_registered', {
        label: root.label,
        initialState: root.currentState(),
        ...(timeoutMs !== undefined && { timeoutMs }),
        ...(forDurationMs !== undefined && { forDurationMs }),
      }, this.auditOptions(tree));

      const now = this.timers.now();
      if (root.currentState()) {
        if (tree.forDurationMs === undefined) {
          return this.settle(tree, 'fired');
        }
        this.startDurationTimer(tree, now);
      }

      if (timeoutMs !== undefined) {
        tree.timeoutTimer = this.timers.scheduleAt(
          now + timeoutMs,
          () => this.handleTimeout(tree),
          { kind: 'timeout', ownerId: root.id }
        );
      }

      return [];
    });

    deliver(deliveries);
  }

  /**
   * Cached state of any registered node.
   *
   * @throws NotFoundError when the node is not part of a registered tree
   */
  getConditionState(node: ConditionNode): boolean {
    const registered = this.nodeIndex.get(node.id)?.nodes.get(node.id);
    if (!registered) {
      throw new NotFoundError('condition', node.id);
    }
    return registered.currentState();
  }

  isRegistered(node: ConditionNode): boolean {
    return this.nodeIndex.has(node.id);
  }

  /**
   * Removes a tree: cancels its timers, unsubscribes its leaves and
   * deregisters every node. No signal is delivered.
   *
   * @throws NotFoundError when the root is not registered
   */
  async removeCondition(root: ConditionNode): Promise<void> {
    await this.exclusive(() => {
      const tree = this.trees.get(root.id);
      if (!tree) {
        throw new NotFoundError('condition', root.id);
      }
      this.settle(tree, 'removed');
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                          EVENT PROPAGATION
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Propagates a device event through every tree watching the device.
   *
   * The value is recorded in the attribute store first, so a registration
   * queued ahead of the event initializes from the value before it. Leaves
   * recompute from the event, then each affected ancestor recomputes once,
   * deepest first. Events are processed in call order.
   */
  async onDeviceEvent(event: DeviceEvent): Promise<void> {
    const deliveries = await this.exclusive(() => {
      if (!this.running) return [];
      this.internals.eventsProcessed++;
      this.values.update(event);

      const leafIds = [...this.router.lookup(event.deviceId)];
      if (leafIds.length === 0) return [];

      const levels = new Map<number, Map<string, TrackedTree>>();
      const changedRoots = new Set<TrackedTree>();
      let maxDepth = 0;

      const markParent = (tree: TrackedTree, node: ConditionNode): void => {
        const parent = tree.parents.get(node.id);
        if (!parent) {
          changedRoots.add(tree);
          return;
        }
        const depth = tree.depth.get(parent.id) ?? 0;
        let level = levels.get(depth);
        if (!level) {
          level = new Map();
          levels.set(depth, level);
        }
        level.set(parent.id, tree);
        maxDepth = Math.max(maxDepth, depth);
      };

      for (const leafId of leafIds) {
        const tree = this.nodeIndex.get(leafId);
        const leaf = tree?.nodes.get(leafId);
        if (!tree || !leaf) continue;

        if (this.recomputeNode(tree, leaf, event)) {
          markParent(tree, leaf);
        }
      }

      for (let depth = maxDepth; depth >= 0; depth--) {
        const level = levels.get(depth);
        if (!level) continue;

        for (const [nodeId, tree] of level) {
          const node = tree.nodes.get(nodeId);
          if (node && this.recomputeNode(tree, node, undefined)) {
            markParent(tree, node);
          }
        }
      }

      const signals: Signal[] = [];
      for (const tree of changedRoots) {
        signals.push(...this.onRootTransition(tree));
      }
      return signals;
    });

    deliver(deliveries);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                            LIFECYCLE
  // ═══════════════════════════════════════════════════════════════════════════

  getStats(): EngineStats {
    return {
      conditions: this.trees.size,
      nodes: this.nodeIndex.size,
      devices: this.router.size,
      ...this.internals
    };
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Stops the engine: waits for queued work, then drops every tree
   * without delivering signals.
   */
  async stop(): Promise<void> {
    this.running = false;

    await this.exclusive(() => {
      for (const tree of [...this.trees.values()]) {
        this.settle(tree, 'removed');
      }
    });

    if (this.ownsTimers) {
      this.timers.stop();
    }

    this.audit.record('engine_stopped', {
      name: this.name,
      ...this.internals
    }, { source: this.name });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  //                         INTERNAL METHODS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Recomputes one node.
   *
   * @returns whether its state changed; a throwing node counts as unchanged
   */
  private recomputeNode(tree: TrackedTree, node: ConditionNode, event: DeviceEvent | undefined): boolean {
    const previous = node.currentState();
    try {
      const next = node.recompute(event);
      return next !== undefined && next !== previous;
    } catch (error) {
      this.internals.recomputeFailures++;
      console.error(`[${this.name}] Condition "${node.label}" failed to recompute:`, error);
      this.audit.record('condition_failed', {
        label: node.label,
        nodeId: node.id,
      }, {
        ...this.auditOptions(tree),
        success: false,
        error: describeError(error),
      });
      return false;
    }
  }

  private onRootTransition(tree: TrackedTree): Signal[] {
    if (tree.settled) return [];

    if (tree.root.currentState()) {
      if (tree.forDurationMs === undefined) {
        return this.settle(tree, 'fired');
      }
      if (!tree.durationTimer) {
        this.startDurationTimer(tree, this.timers.now());
      }
    } else if (tree.durationTimer) {
      this.timers.cancel(tree.durationTimer);
      tree.durationTimer = undefined;
    }
    return [];
  }

  private startDurationTimer(tree: TrackedTree, now: number): void {
    if (tree.forDurationMs === undefined) return;

    tree.durationTimer = this.timers.scheduleAt(
      now + tree.forDurationMs,
      timer => this.handleDurationElapsed(tree, timer.id),
      { kind: 'duration', ownerId: tree.root.id }
    );
  }

  private async handleDurationElapsed(tree: TrackedTree, timerId: string): Promise<void> {
    const deliveries = await this.exclusive(() => {
      if (tree.settled || tree.durationTimer?.id !== timerId) return [];
      tree.durationTimer = undefined;
      return tree.root.currentState() ? this.settle(tree, 'fired') : [];
    });
    deliver(deliveries);
  }

  private async handleTimeout(tree: TrackedTree): Promise<void> {
    const deliveries = await this.exclusive(() => {
      if (tree.settled) return [];
      tree.timeoutTimer = undefined;
      return this.settle(tree, 'timed_out');
    });
    deliver(deliveries);
  }

  /**
   * Ends a tree's lifetime: cancels its timers, unsubscribes its leaves and
   * deregisters its nodes. Must run inside the serialized section.
   *
   * @returns the signals to deliver once the section is left
   */
  private settle(tree: TrackedTree, outcome: Settlement): Signal[] {
    if (tree.settled) return [];
    tree.settled = true;

    if (tree.timeoutTimer) {
      this.timers.cancel(tree.timeoutTimer);
      tree.timeoutTimer = undefined;
    }
    if (tree.durationTimer) {
      this.timers.cancel(tree.durationTimer);
      tree.durationTimer = undefined;
    }

    for (const node of tree.nodes.values()) {
      if (node.isLeaf) {
        for (const deviceId of node.deviceIds) {
          this.router.unsubscribe(deviceId, node.id);
        }
      }
      this.nodeIndex.delete(node.id);
    }
    this.trees.delete(tree.root.id);

    switch (outcome) {
      case 'fired':
        this.internals.fired++;
        this.audit.record('condition_fired', { label: tree.root.label }, this.auditOptions(tree));
        return tree.signals.fired ? [tree.signals.fired] : [];

      case 'timed_out':
        this.internals.timedOut++;
        this.audit.record('condition_timed_out', { label: tree.root.label }, this.auditOptions(tree));
        return tree.signals.timeout ? [tree.signals.timeout] : [];

      case 'removed':
        this.internals.removed++;
        this.audit.record('condition_removed', { label: tree.root.label }, this.auditOptions(tree));
        return [];
    }
  }

  private auditOptions(tree: TrackedTree): {
    source: string;
    conditionId: string;
    ruleName: string | undefined;
    sceneName: string | undefined;
  } {
    return {
      source: this.name,
      conditionId: tree.root.id,
      ruleName: tree.context.ruleName,
      sceneName: tree.context.sceneName,
    };
  }

  /** Runs a task in the serialized section, after everything queued before it. */
  private exclusive<T>(task: () => T): Promise<T> {
    const run = this.processingQueue.then(task);
    this.processingQueue = run.then(() => undefined, () => undefined);
    return run;
  }

  private ensureRunning(): void {
    if (!this.running) {
      throw new Error(`RuleEngine "${this.name}" is not running`);
    }
  }
}

function deliver(signals: readonly Signal[]): void {
  for (const signal of signals) {
    signal.set();
  }
}

function toMilliseconds(value: Duration | undefined, option: string): number | undefined {
  try {
    return parseOptionalDuration(value);
  } catch (error) {
    throw new TimerError(`Invalid ${option}: ${describeError(error)}`);
  }
}

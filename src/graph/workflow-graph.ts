import { evaluateAll, readField } from '../policy/index.js';
import { GraphValidationError, FatalError } from '../errors/index.js';
import type { Payload, Tier } from '../types/index.js';
import type {
  ConditionalRoute,
  EdgePredicate,
  EdgeRule,
  NodeDefinition,
  NodeOptions,
  NodeSelection,
  RouteInput,
  RouteTarget,
  TerminalOutcome,
} from './types.js';

export interface GraphDefaults {
  maxRetries: number;
  timeoutMs: number;
}

const DEFAULTS: GraphDefaults = { maxRetries: 2, timeoutMs: 30_000 };

function toSelection(target: RouteTarget): NodeSelection {
  return typeof target === 'string'
    ? { kind: 'next', node: target }
    : { kind: 'terminal', outcome: target.terminal };
}

function targetNodes(targets: RouteTarget[]): string[] {
  return targets.filter((t): t is string => typeof t === 'string');
}

/**
 * Directed workflow graph. Nodes bind capability tags; each node carries
 * exactly one edge rule whose predicate picks the next step from task state.
 * The graph is frozen once `validate()` passes.
 */
export class WorkflowGraph {
  private readonly nodes = new Map<string, NodeDefinition>();
  private readonly rules = new Map<string, EdgeRule[]>();
  private readonly entries = new Set<string>();
  private readonly escalationTargets: Partial<Record<Tier, string>> = {};
  private readonly defaults: GraphDefaults;
  private frozen = false;

  constructor(defaults: Partial<GraphDefaults> = {}) {
    this.defaults = { ...DEFAULTS, ...defaults };
  }

  get validated(): boolean {
    return this.frozen;
  }

  private assertMutable(): void {
    if (this.frozen) throw new Error('Workflow graph is frozen after validate()');
  }

  addNode(id: string, capability: string, opts: NodeOptions = {}): this {
    this.assertMutable();
    if (this.nodes.has(id)) throw new Error(`Duplicate node "${id}"`);
    if (id.startsWith('@')) throw new Error(`Node id "${id}" is reserved for terminal markers`);
    this.nodes.set(id, {
      id,
      capability,
      tier: opts.tier ?? 'operational',
      maxRetries: opts.maxRetries ?? this.defaults.maxRetries,
      timeoutMs: opts.timeoutMs ?? this.defaults.timeoutMs,
      requiredFields: opts.requiredFields ?? [],
      input: opts.input,
      escalation: { ...opts.escalation },
      fanIn: opts.fanIn ?? false,
    });
    return this;
  }

  addEntry(id: string): this {
    this.assertMutable();
    this.entries.add(id);
    return this;
  }

  setEscalationTarget(tier: Tier, nodeId: string): this {
    this.assertMutable();
    this.escalationTargets[tier] = nodeId;
    return this;
  }

  addEdge(from: string, rule: Omit<EdgeRule, 'from' | 'kind'> & { kind?: EdgeRule['kind'] }): this {
    this.assertMutable();
    const list = this.rules.get(from) ?? [];
    list.push({ ...rule, from, kind: rule.kind ?? 'custom', targets: [...rule.targets] });
    this.rules.set(from, list);
    return this;
  }

  sequential(from: string, to: string): this {
    return this.addEdge(from, { kind: 'sequential', targets: [to], select: () => ({ kind: 'next', node: to }) });
  }

  terminal(from: string, outcome: TerminalOutcome = 'succeeded'): this {
    return this.addEdge(from, { kind: 'terminal', targets: [], select: () => ({ kind: 'terminal', outcome }) });
  }

  /** Ordered routes; first whose conditions all hold wins, else `otherwise`. */
  conditional(from: string, routes: ConditionalRoute[], otherwise: RouteTarget): this {
    const frozenRoutes = routes.map((r) => ({ when: [...r.when], to: r.to }));
    const select: EdgePredicate = (state) => {
      for (const route of frozenRoutes) {
        if (evaluateAll(route.when, state.payload)) return toSelection(route.to);
      }
      return toSelection(otherwise);
    };
    return this.addEdge(from, {
      kind: 'conditional',
      targets: targetNodes([...frozenRoutes.map((r) => r.to), otherwise]),
      select,
    });
  }

  fanOut(from: string, branches: string[], join: string, opts: { quorum?: number } = {}): this {
    const fanOut = { branches: [...branches], join, quorum: opts.quorum ?? branches.length };
    return this.addEdge(from, {
      kind: 'fan_out',
      targets: [...branches],
      fanOut,
      select: () => ({ kind: 'fan_out', ...fanOut, branches: [...fanOut.branches] }),
    });
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  node(id: string): NodeDefinition {
    const node = this.nodes.get(id);
    if (!node) throw new Error(`Unknown node "${id}"`);
    return node;
  }

  nodeIds(): string[] {
    return [...this.nodes.keys()];
  }

  entryPoints(): string[] {
    return [...this.entries];
  }

  isEntry(id: string): boolean {
    return this.entries.has(id);
  }

  /** Node a task escalating to `tier` should continue at, if any. */
  escalationTargetFor(nodeId: string, tier: Tier): string | undefined {
    return this.nodes.get(nodeId)?.escalation[tier] ?? this.escalationTargets[tier];
  }

  private ruleFor(nodeId: string): EdgeRule {
    const list = this.rules.get(nodeId);
    if (!list || list.length === 0) throw new Error(`Node "${nodeId}" has no edge rule`);
    return list[0];
  }

  /** Evaluate the rule bound to `state.currentNode`. Pure: no side effects. */
  resolve(state: RouteInput): NodeSelection {
    if (!this.frozen) throw new Error('Workflow graph must be validated before resolving');
    const rule = this.ruleFor(state.currentNode);
    const selection = rule.select(state);

    if (selection.kind === 'next' && !rule.targets.includes(selection.node)) {
      throw new FatalError(`Edge rule for "${rule.from}" selected undeclared node "${selection.node}"`);
    }
    if (selection.kind === 'fan_out') {
      const declared = rule.fanOut;
      const same =
        declared !== undefined &&
        declared.join === selection.join &&
        declared.branches.length === selection.branches.length &&
        declared.branches.every((b, i) => selection.branches[i] === b);
      if (!same) {
        throw new FatalError(`Edge rule for "${rule.from}" produced an undeclared fan-out`);
      }
    }
    return selection;
  }

  /** Problems with a payload entering at `entryNode`; empty when acceptable. */
  checkEntryPayload(entryNode: string, payload: Payload): string[] {
    if (!this.isEntry(entryNode)) return [`"${entryNode}" is not an entry point`];
    const node = this.node(entryNode);
    const issues = node.requiredFields
      .filter((field) => readField(payload, field) === undefined)
      .map((field) => `missing required field "${field}"`);
    if (node.input) {
      const parsed = node.input.safeParse(payload);
      if (!parsed.success) {
        for (const issue of parsed.error.issues) {
          issues.push(`${issue.path.join('.') || 'payload'}: ${issue.message}`);
        }
      }
    }
    return issues;
  }

  private successors(nodeId: string): string[] {
    const out: string[] = [];
    for (const rule of this.rules.get(nodeId) ?? []) {
      out.push(...rule.targets);
      if (rule.fanOut) out.push(rule.fanOut.join);
    }
    const node = this.nodes.get(nodeId);
    if (node) out.push(...Object.values(node.escalation).filter((t): t is string => t !== undefined));
    return out;
  }

  /** Every structural problem; empty when the graph is valid. */
  issues(): string[] {
    const issues: string[] = [];
    const known = (id: string) => this.nodes.has(id);

    if (this.entries.size === 0) issues.push('graph declares no entry point');
    for (const entry of this.entries) {
      if (!known(entry)) issues.push(`entry point "${entry}" is not a node`);
    }

    for (const [from, list] of this.rules) {
      if (!known(from)) issues.push(`edge from unknown node "${from}"`);
      if (list.length > 1) issues.push(`node "${from}" has ${list.length} edge rules; expected one`);
      for (const rule of list) {
        for (const target of rule.targets) {
          if (!known(target)) issues.push(`edge from "${from}" targets unknown node "${target}"`);
        }
        if (rule.fanOut && !known(rule.fanOut.join)) {
          issues.push(`fan-out at "${from}" joins unknown node "${rule.fanOut.join}"`);
        }
      }
    }

    for (const node of this.nodes.values()) {
      if (!this.rules.has(node.id)) issues.push(`node "${node.id}" has no outgoing edge rule`);
      for (const [tier, target] of Object.entries(node.escalation)) {
        issues.push(...this.escalationIssues(`node "${node.id}"`, tier, target));
      }
    }
    for (const [tier, target] of Object.entries(this.escalationTargets)) {
      issues.push(...this.escalationIssues('graph', tier, target));
    }

    issues.push(...this.fanOutIssues());
    issues.push(...this.reachabilityIssues());
    return issues;
  }

  private escalationIssues(owner: string, tier: string, target: string | undefined): string[] {
    if (target === undefined) return [];
    const node = this.nodes.get(target);
    if (!node) return [`${owner} escalates to unknown node "${target}"`];
    if (node.tier !== tier) {
      return [`${owner} escalation target "${target}" for ${tier} belongs to the ${node.tier} tier`];
    }
    return [];
  }

  private fanOutIssues(): string[] {
    const issues: string[] = [];
    const joins = new Set<string>();

    for (const [from, list] of this.rules) {
      for (const rule of list) {
        if (!rule.fanOut) continue;
        const { branches, join, quorum } = rule.fanOut;
        joins.add(join);
        if (branches.length === 0) issues.push(`fan-out at "${from}" has no branches`);
        if (new Set(branches).size !== branches.length) issues.push(`fan-out at "${from}" repeats a branch`);
        if (quorum < 1 || quorum > branches.length) {
          issues.push(`fan-out at "${from}" has quorum ${quorum} outside 1..${branches.length}`);
        }
        const joinNode = this.nodes.get(join);
        if (joinNode && !joinNode.fanIn) {
          issues.push(`fan-out at "${from}" joins "${join}", which is not declared as a fan-in node`);
        }
        for (const branch of branches) {
          if (!this.nodes.has(branch)) continue;
          issues.push(...this.branchIssues(from, branch, join));
        }
      }
    }

    for (const node of this.nodes.values()) {
      if (node.fanIn && !joins.has(node.id)) {
        issues.push(`fan-in node "${node.id}" is not the join of any fan-out`);
      }
    }
    return issues;
  }

  /** Walk a branch's possible paths; it must reach the join without fanning out again. */
  private branchIssues(from: string, start: string, join: string): string[] {
    const issues: string[] = [];
    const seen = new Set<string>();
    const queue = [start];
    let reachesJoin = false;

    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined || seen.has(id)) continue;
      seen.add(id);
      if (id === join) {
        reachesJoin = true;
        continue;
      }
      for (const rule of this.rules.get(id) ?? []) {
        if (rule.fanOut) {
          issues.push(`branch "${start}" of fan-out at "${from}" fans out again at "${id}"`);
          continue;
        }
        queue.push(...rule.targets.filter((t) => this.nodes.has(t)));
      }
    }

    if (!reachesJoin) issues.push(`branch "${start}" of fan-out at "${from}" never reaches join "${join}"`);
    return issues;
  }

  private reachabilityIssues(): string[] {
    const referenced = new Set<string>();
    for (const id of this.nodes.keys()) {
      for (const next of this.successors(id)) {
        if (next !== id) referenced.add(next);
      }
    }
    for (const target of Object.values(this.escalationTargets)) {
      if (target !== undefined) referenced.add(target);
    }

    const reached = new Set<string>();
    const queue = [...this.entries].filter((e) => this.nodes.has(e));
    for (const target of Object.values(this.escalationTargets)) {
      if (target !== undefined && this.nodes.has(target)) queue.push(target);
    }
    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined || reached.has(id)) continue;
      reached.add(id);
      queue.push(...this.successors(id).filter((t) => this.nodes.has(t)));
    }

    const issues: string[] = [];
    for (const id of this.nodes.keys()) {
      if (this.entries.has(id)) continue;
      if (!referenced.has(id)) issues.push(`node "${id}" is an orphan: nothing leads to it`);
      else if (!reached.has(id)) issues.push(`node "${id}" is unreachable from any entry point`);
    }
    return issues;
  }

  /** Check structure and freeze the graph. Throws `GraphValidationError` listing every problem. */
  validate(): void {
    if (this.frozen) return;
    const issues = this.issues();
    if (issues.length > 0) throw new GraphValidationError(issues);
    this.frozen = true;
  }
}

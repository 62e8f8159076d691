import { EventEmitter } from 'node:events';
import { logger, withSpan, PreconditionError, ResolutionError } from '@switchboard/shared';
import type { Agent, HumanProxy, Prompt } from './agent.js';
import { ConversationHistory, type HistoryItem } from './history.js';
import { newId, type AgentMessage, type ChatTurn } from './message.js';
import { isStopSentinel, parseRouteDecision, type RouteDecision } from './route-decision.js';
import { buildRouterSystemPrompt, CONTINUATION_TEMPLATE, EVALUATION_TEMPLATE } from './router-agent.js';
import { renderTemplate } from './template.js';

const log = logger.child({ module: 'router' });

export const DEFAULT_MAX_ITERATIONS = 32;

export type RouterState =
  | 'idle'
  | 'awaiting-decision'
  | 'dispatching'
  | 'merging-history'
  | 'goal-complete'
  | 'stopped'
  | 'exhausted'
  | 'error';

export type GoalOutcome = 'goal-complete' | 'stopped' | 'exhausted';

/**
 * Valid state transitions for the router state machine.
 * Terminal states may start a new pursuit or be reset by initializeAgents.
 */
const VALID_TRANSITIONS: Record<RouterState, Set<RouterState>> = {
  idle: new Set(['awaiting-decision']),
  'awaiting-decision': new Set(['dispatching', 'goal-complete', 'stopped', 'exhausted', 'error']),
  dispatching: new Set(['merging-history', 'error']),
  'merging-history': new Set(['awaiting-decision', 'error']),
  'goal-complete': new Set(['awaiting-decision', 'idle']),
  stopped: new Set(['awaiting-decision', 'idle']),
  exhausted: new Set(['awaiting-decision', 'idle']),
  error: new Set(['awaiting-decision', 'idle']),
};

const TERMINAL: ReadonlySet<RouterState> = new Set(['goal-complete', 'stopped', 'exhausted', 'error']);

export interface RouterTransition {
  from: RouterState;
  to: RouterState;
}

export interface DispatchRecord {
  iteration: number;
  agentId: string;
  agentName: string;
  messageId: string;
}

export interface GoalResult {
  outcome: GoalOutcome;
  /** Number of dispatches performed */
  iterations: number;
  sessionId: string;
  decisions: RouteDecision[];
  dispatches: DispatchRecord[];
  /** Shared history at the end of the pursuit */
  history: readonly HistoryItem[];
}

export interface PursueGoalOptions {
  /** Exact number of dispatches allowed (default 32) */
  maxIterations?: number;
  signal?: AbortSignal;
}

export interface RouterOptions {
  /** Usually built with createRouterAgent */
  routerAgent: Agent;
}

interface Roster {
  humanProxy: HumanProxy;
  agents: readonly Agent[];
  sessionId: string;
}

type Resolution =
  | { kind: 'goal-complete' }
  | { kind: 'stopped' }
  | { kind: 'dispatch'; agent: Agent };

/**
 * Drives a goal to completion by asking the router agent who acts next,
 * dispatching to that agent and folding its turn into a shared history.
 *
 * Emits `transition` ({ from, to }) and the name of each state entered.
 */
export class Router extends EventEmitter {
  private readonly routerAgent: Agent;
  private readonly shared = new ConversationHistory();
  private roster: Roster | undefined;
  private _state: RouterState = 'idle';
  private running = false;

  constructor(opts: RouterOptions) {
    super();
    this.routerAgent = opts.routerAgent;
  }

  get state(): RouterState {
    return this._state;
  }

  get sessionId(): string | undefined {
    return this.roster?.sessionId;
  }

  /** Shared history accumulated across dispatches */
  get history(): ConversationHistory {
    return this.shared;
  }

  /**
   * Validate the roster, prime the router agent's system prompt and put every
   * participant on one new session. Returns the session id.
   */
  initializeAgents(humanProxy: HumanProxy, agents: readonly Agent[], systemPromptOverride?: string): string {
    if (this.running) {
      throw new PreconditionError('cannot re-initialize while a goal is being pursued', { operation: 'initializeAgents' });
    }
    validateRoster(humanProxy, agents);

    this.routerAgent.setSystemPrompt(
      systemPromptOverride?.trim() ? systemPromptOverride : buildRouterSystemPrompt(humanProxy, agents),
    );

    const sessionId = newId();
    this.routerAgent.startSession(sessionId);
    humanProxy.setSession(sessionId);
    for (const agent of agents) {
      agent.setSession(sessionId);
    }

    this.shared.clear();
    this.roster = { humanProxy, agents: [...agents], sessionId };
    if (this._state !== 'idle') this.transition('idle');

    log.info(
      { sessionId, agents: agents.map((a) => a.name), humanProxy: humanProxy.name },
      'router initialized',
    );
    return sessionId;
  }

  async pursueGoal(goal: string, options: PursueGoalOptions = {}): Promise<GoalResult> {
    const roster = this.roster;
    if (!roster) {
      throw new PreconditionError('initializeAgents must be called before pursueGoal', { operation: 'pursueGoal' });
    }
    if (!goal.trim()) {
      throw new PreconditionError('goal must not be empty', { operation: 'pursueGoal', sessionId: roster.sessionId });
    }
    const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new PreconditionError('maxIterations must be a positive integer', {
        operation: 'pursueGoal',
        maxIterations,
      });
    }
    if (this.running) {
      throw new PreconditionError('a goal is already being pursued', { operation: 'pursueGoal', sessionId: roster.sessionId });
    }

    this.running = true;
    try {
      return await withSpan(
        'router.pursue-goal',
        { 'session.id': roster.sessionId, 'router.max_iterations': maxIterations },
        async (span) => {
          const result = await this.run(roster, goal, maxIterations, options.signal);
          span.setAttribute('router.outcome', result.outcome);
          span.setAttribute('router.iterations', result.iterations);
          return result;
        },
      );
    } catch (err) {
      if (!TERMINAL.has(this._state)) this.transition('error');
      log.error({ err, sessionId: roster.sessionId }, 'goal pursuit failed');
      throw err;
    } finally {
      this.running = false;
    }
  }

  private async run(roster: Roster, goal: string, maxIterations: number, signal?: AbortSignal): Promise<GoalResult> {
    const decisions: RouteDecision[] = [];
    const dispatches: DispatchRecord[] = [];

    const finish = (outcome: GoalOutcome): GoalResult => {
      this.transition(outcome);
      log.info({ sessionId: roster.sessionId, outcome, iterations: dispatches.length }, 'goal pursuit finished');
      return {
        outcome,
        iterations: dispatches.length,
        sessionId: roster.sessionId,
        decisions,
        dispatches,
        history: this.shared.items(),
      };
    };

    // The goal is the human's request, whoever it is handed to.
    const goalTurn: ChatTurn = { role: 'user', content: goal, name: roster.humanProxy.name };
    // The router already holds the goal; its copy in the shared history is skipped when merging back.
    let goalMessageId: string | undefined;

    this.transition('awaiting-decision');
    signal?.throwIfAborted();
    let decision = await this.decide(goalTurn, signal);
    decisions.push(decision);

    for (;;) {
      const resolution = this.resolve(roster, decision);
      if (resolution.kind !== 'dispatch') return finish(resolution.kind);
      if (dispatches.length >= maxIterations) return finish('exhausted');

      const agent = resolution.agent;
      this.transition('dispatching');
      signal?.throwIfAborted();
      const iteration = dispatches.length + 1;
      const first = iteration === 1;
      const goalIndex = this.shared.length;
      const response = await this.dispatch(roster, agent, decision, first ? goalTurn : undefined, goal, signal);
      dispatches.push({ iteration, agentId: agent.id, agentName: agent.name, messageId: response.id });
      if (first) goalMessageId = agent.history.items()[goalIndex]?.message.id;

      this.transition('merging-history');
      this.shared.merge(agent.history);
      if (agent !== roster.humanProxy) {
        await roster.humanProxy.printMessage(response.content, response.mimeType);
      }
      this.routerAgent.history.merge(this.shared.items().filter((item) => item.message.id !== goalMessageId));

      this.transition('awaiting-decision');
      signal?.throwIfAborted();
      decision = await this.decide({ template: EVALUATION_TEMPLATE, data: { agentName: agent.name, goal } }, signal);
      decisions.push(decision);
    }
  }

  private async decide(prompt: Prompt, signal?: AbortSignal): Promise<RouteDecision> {
    const message = await this.routerAgent.send(prompt, { signal });
    const decision = parseRouteDecision(message.content);
    log.info(
      {
        sessionId: this.sessionId,
        next: decision.next,
        confidence: decision.confidence,
        goalCompleted: decision.goalCompleted,
        rationale: decision.rationale,
      },
      'route decision',
    );
    return decision;
  }

  private resolve(roster: Roster, decision: RouteDecision): Resolution {
    if (decision.goalCompleted) return { kind: 'goal-complete' };
    if (isStopSentinel(decision.next)) return { kind: 'stopped' };

    const wanted = decision.next.trim().toLowerCase();
    const agent = [roster.humanProxy, ...roster.agents].find((a) => a.name.toLowerCase() === wanted);
    if (!agent) {
      throw new ResolutionError(`route decision names unknown agent '${decision.next}'`, {
        operation: 'resolve',
        sessionId: roster.sessionId,
      });
    }
    return { kind: 'dispatch', agent };
  }

  /**
   * Hand the shared history to `agent` and let it take one turn. The goal is
   * sent as a prompt on the first dispatch. Afterwards the agent replies to
   * the history it was given, unless the last turn is its own: then it is
   * asked to continue, so the request never ends on its own reply.
   */
  private async dispatch(
    roster: Roster,
    agent: Agent,
    decision: RouteDecision,
    goalTurn: ChatTurn | undefined,
    goal: string,
    signal?: AbortSignal,
  ): Promise<AgentMessage> {
    agent.history.clear();
    agent.history.merge(this.shared);

    await roster.humanProxy.printMessage(`${agent.name}: ${decision.rationale}`, 'text/plain');

    if (goalTurn) {
      log.info({ sessionId: roster.sessionId, agentId: agent.id, mode: 'goal' }, 'dispatching');
      return agent.send(goalTurn, { signal });
    }

    const last = agent.history.last()?.message;
    if (last && last.agentId === agent.id && last.role !== 'user') {
      log.info({ sessionId: roster.sessionId, agentId: agent.id, mode: 'continue' }, 'dispatching');
      const content = renderTemplate(CONTINUATION_TEMPLATE, { goal, rationale: decision.rationale });
      return agent.send({ role: 'user', content, name: this.routerAgent.name }, { signal });
    }

    log.info({ sessionId: roster.sessionId, agentId: agent.id, mode: 'reply' }, 'dispatching');
    return agent.reply({ signal });
  }

  private transition(to: RouterState): void {
    const from = this._state;
    const allowed = VALID_TRANSITIONS[from];
    if (!allowed.has(to)) {
      throw new Error(`Invalid router transition: ${from} -> ${to}`);
    }
    this._state = to;
    log.debug({ from, to }, 'router transition');
    this.emit('transition', { from, to } satisfies RouterTransition);
    this.emit(to);
  }
}

function validateRoster(humanProxy: HumanProxy, agents: readonly Agent[]): void {
  const seen = new Set<string>();
  for (const agent of [humanProxy, ...agents]) {
    const key = agent.name.trim().toLowerCase();
    if (!key) {
      throw new PreconditionError('agent name is required', { operation: 'initializeAgents', agentId: agent.id });
    }
    if (seen.has(key)) {
      throw new PreconditionError(`duplicate agent name '${agent.name}'`, { operation: 'initializeAgents', agentId: agent.id });
    }
    if (isStopSentinel(key)) {
      throw new PreconditionError(`agent name '${agent.name}' is reserved`, { operation: 'initializeAgents', agentId: agent.id });
    }
    seen.add(key);
  }
}

import type { CompletionProvider, CompletionSettings } from '@switchboard/shared';
import type { Agent } from './agent.js';
import { DATE_TOOLS } from './date-tools.js';
import { LlmAgent, type MessageCompletedHandler } from './llm-agent.js';
import { ROUTE_DECISION_FORMAT, STOP_SENTINELS } from './route-decision.js';
import type { MessageStore } from './store.js';
import { renderTemplate } from './template.js';

export const ROUTER_AGENT_ID = 'router-agent';
export const ROUTER_AGENT_NAME = 'Router Agent';

const ROUTER_SYSTEM_TEMPLATE = `You are a router agent that determines which specialized agent should handle a user's request.
You have access to the following specialized agents:
{{#agents}}
- {{name}}: {{description}}
{{/agents}}
- {{human.name}}: {{human.description}}

Pick the agent best placed to move the goal forward. If none are suitable, route to the human agent ({{human.name}}).
Set "goalCompleted" to true once the goal has been achieved.
To end the conversation without completing the goal, set "next" to one of: {{stopSentinels}}.
Provide your decision in the specified JSON format.`;

/** Re-query prompt sent to the router after each dispatch */
export const EVALUATION_TEMPLATE = `{{agentName}} has responded. Given the goal "{{goal}}" and the conversation so far, decide whether the goal is complete. If it is not, choose the agent that should act next.`;

/** Sent instead of a reply when the router picks the agent that spoke last */
export const CONTINUATION_TEMPLATE = `{{#rationale}}You have been asked to go on: {{rationale}}
{{/rationale}}Continue working toward the goal "{{goal}}".`;

export function buildRouterSystemPrompt(humanProxy: Agent, agents: readonly Agent[]): string {
  return renderTemplate(ROUTER_SYSTEM_TEMPLATE, {
    agents: agents.map((a) => ({ name: a.name, description: a.description })),
    human: { name: humanProxy.name, description: humanProxy.description },
    stopSentinels: STOP_SENTINELS.join(', '),
  });
}

export interface RouterAgentOptions {
  provider: CompletionProvider;
  store: MessageStore;
  /** Merged over the routing defaults */
  settings?: CompletionSettings;
  onMessageCompleted?: MessageCompletedHandler;
}

/**
 * LLM agent that answers with a RouteDecision, deterministically, on the
 * router model. The date tools are invoked automatically when the model calls them.
 */
export function createRouterAgent(opts: RouterAgentOptions): LlmAgent {
  return new LlmAgent({
    id: ROUTER_AGENT_ID,
    name: ROUTER_AGENT_NAME,
    description: 'Decides which agent acts next and when the goal is complete.',
    provider: opts.provider,
    store: opts.store,
    settings: {
      role: 'router',
      temperature: 0,
      responseFormat: ROUTE_DECISION_FORMAT,
      tools: DATE_TOOLS,
      toolChoice: 'auto',
      ...opts.settings,
    },
    onMessageCompleted: opts.onMessageCompleted,
  });
}

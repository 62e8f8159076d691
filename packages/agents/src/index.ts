export * from './message.js';
export * from './store.js';
export { SqliteMessageStore } from './sqlite-store.js';
export { renderTemplate } from './template.js';
export { ConversationHistory, toHistoryItem, type HistoryItem } from './history.js';
export * from './agent.js';
export { LlmAgent, toCompletionTurns, type LlmAgentOptions, type MessageCompletedHandler } from './llm-agent.js';
export { HumanProxyAgent, HUMAN_PROXY_MODEL_ID, type HumanProxyAgentOptions } from './human-proxy.js';
export * from './route-decision.js';
export {
  createRouterAgent,
  buildRouterSystemPrompt,
  CONTINUATION_TEMPLATE,
  EVALUATION_TEMPLATE,
  ROUTER_AGENT_ID,
  ROUTER_AGENT_NAME,
  type RouterAgentOptions,
} from './router-agent.js';
export { createDateTools, DATE_TOOLS, formatLocal } from './date-tools.js';
export * from './router.js';
export { HumanChat, type EndCondition } from './human-chat.js';

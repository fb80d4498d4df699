import { RoutingConfig, RoutingDecision } from '../types/index.js';

function nonEmpty(value: string | undefined): value is string {
  return typeof value === 'string' && value.length > 0;
}

/**
 * Resolve the agent that serves an application.
 *
 * An explicit per-app agent always wins over the default. Returns null when
 * neither resolves, which callers report as an unmapped application.
 */
export function routeRequest(appName: string, config: RoutingConfig): RoutingDecision | null {
  const rule = Object.prototype.hasOwnProperty.call(config.routing_rules, appName)
    ? config.routing_rules[appName]
    : undefined;

  const ruleAgent = rule?.agent;
  const agentId = nonEmpty(ruleAgent) ? ruleAgent : config.default_agent;
  if (!nonEmpty(agentId)) {
    return null;
  }

  const knowledgeBaseId = rule?.knowledge_base;
  return nonEmpty(knowledgeBaseId) ? { agentId, knowledgeBaseId } : { agentId };
}

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { RoutingConfig, RoutingRule } from '../types/index.js';

export type Environment = Record<string, string | undefined>;

// YAML renders an empty value as null, so optional strings accept it too
const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const routingRuleSchema = z
  .object({
    agent: optionalText,
    knowledge_base: optionalText
  })
  .nullish()
  .transform((rule): RoutingRule => {
    const result: RoutingRule = {};
    if (rule?.agent !== undefined) result.agent = rule.agent;
    if (rule?.knowledge_base !== undefined) result.knowledge_base = rule.knowledge_base;
    return result;
  });

const routingConfigSchema = z.object({
  agents: z.array(z.string()).default([]),
  knowledge_bases: z.array(z.string()).default([]),
  default_agent: optionalText.transform((value) => value ?? ''),
  routing_rules: z.record(z.string(), routingRuleSchema).default({})
});

function splitList(raw: string | undefined): string[] {
  return (raw ?? '').split(',').map((entry) => entry.trim());
}

/**
 * Build routing from the flat comma-separated lists. Application i maps to
 * agent i and knowledge base i; a missing agent falls back to the default.
 */
export function getDefaultRoutingConfig(env: Environment): RoutingConfig {
  const agents = splitList(env['BEDROCK_AGENTS']);
  const knowledgeBases = splitList(env['KNOWLEDGE_BASES']);
  const applications = splitList(env['APPLICATIONS']);

  const configuredAgents = agents.filter(Boolean);
  // the first list position, even when that entry is empty
  const defaultAgent = env['DEFAULT_AGENT']?.trim() || agents[0] || '';

  const routingRules: Record<string, RoutingRule> = {};
  applications.forEach((app, index) => {
    if (!app) return;
    const rule: RoutingRule = { agent: agents[index] || defaultAgent };
    if (knowledgeBases[index]) {
      rule.knowledge_base = knowledgeBases[index];
    }
    routingRules[app] = rule;
  });

  return {
    agents: configuredAgents,
    knowledge_bases: knowledgeBases.filter(Boolean),
    default_agent: defaultAgent,
    routing_rules: routingRules
  };
}

/**
 * Parse a routing document. Text starting with `{` is JSON, anything else
 * is YAML. Throws on syntax errors and on documents of the wrong shape.
 */
export function parseRoutingConfig(source: string): RoutingConfig {
  const trimmed = source.trim();
  const document: unknown = trimmed.startsWith('{') ? JSON.parse(trimmed) : parseYaml(trimmed);
  return routingConfigSchema.parse(document);
}

/**
 * Load routing for one batch from ROUTING_CONFIG, falling back to the flat
 * environment lists when it is unset or unusable.
 */
export function loadRoutingConfig(env: Environment = process.env): RoutingConfig {
  const source = env['ROUTING_CONFIG'];
  if (!source || !source.trim()) {
    return getDefaultRoutingConfig(env);
  }

  try {
    return parseRoutingConfig(source);
  } catch (error) {
    const reason = error instanceof z.ZodError
      ? error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ')
      : error instanceof Error ? error.message : String(error);
    console.warn(`Error parsing routing config: ${reason}, using defaults`);
    return getDefaultRoutingConfig(env);
  }
}

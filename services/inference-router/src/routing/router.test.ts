import { RoutingConfig } from '../types/index.js';
import { routeRequest } from './router.js';

const baseConfig: RoutingConfig = {
  agents: ['AGENTDEFAULT', 'AGENTSUPPORT'],
  knowledge_bases: ['KBSUPPORT'],
  default_agent: 'AGENTDEFAULT',
  routing_rules: {
    support: { agent: 'AGENTSUPPORT', knowledge_base: 'KBSUPPORT' },
    marketing: { agent: 'AGENTMARKETING' },
    'kb-only': { knowledge_base: 'KBDOCS' },
    'blank-agent': { agent: '' },
  },
};

describe('routeRequest', () => {
  it('should prefer the explicit per-app agent over the default', () => {
    expect(routeRequest('support', baseConfig)).toEqual({ agentId: 'AGENTSUPPORT', knowledgeBaseId: 'KBSUPPORT' });
  });

  it('should omit the knowledge base when the rule has none', () => {
    expect(routeRequest('marketing', baseConfig)).toEqual({ agentId: 'AGENTMARKETING' });
  });

  it('should fall back to the default agent for unknown apps', () => {
    expect(routeRequest('unknown-app', baseConfig)).toEqual({ agentId: 'AGENTDEFAULT' });
  });

  it('should use the default agent when the rule names none but keep its knowledge base', () => {
    expect(routeRequest('kb-only', baseConfig)).toEqual({ agentId: 'AGENTDEFAULT', knowledgeBaseId: 'KBDOCS' });
  });

  it('should treat an empty rule agent as absent', () => {
    expect(routeRequest('blank-agent', baseConfig)).toEqual({ agentId: 'AGENTDEFAULT' });
  });

  it('should return null when nothing resolves', () => {
    const config: RoutingConfig = { ...baseConfig, default_agent: '' };
    expect(routeRequest('unknown-app', config)).toBeNull();
  });

  it('should not resolve inherited object properties as rules', () => {
    const config: RoutingConfig = { ...baseConfig, default_agent: '' };
    expect(routeRequest('constructor', config)).toBeNull();
  });
});

export {
  configSchema,
  loadConfig,
  getConfig,
  resetConfig,
  type Config,
  type ProviderConfig,
  type AgentsConfig,
  type StoreConfig,
  type RuntimeConfig,
  type OrchestratorConfig,
  type LoggingConfig,
} from './config.js';
export { agentDefinitionSchema, parseAgentDefinitions, loadAgentDefinitions } from './agents.js';

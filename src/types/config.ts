export interface BedrockAgentConfig {
  agentId: string;
  agentAliasId: string;
  region: string;
  readTimeoutMs: number;
  maxAttempts: number;
}

export interface AppConfig {
  debug: boolean;
  port: number;
  projectRoot: string;
  environmentName: string;
  agent: BedrockAgentConfig;
  scenariosPath: string;
  maxConversations: number;
}

export type ScenarioSeverity = "critical" | "high" | "medium" | "low";

export interface Scenario {
  id: string;
  title: string;
  severity: ScenarioSeverity;
  description: string;
}

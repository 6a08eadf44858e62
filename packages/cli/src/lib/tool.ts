import type { ActionDefinition, ParameterBag, RestClient, ServiceConfig } from "@opsbridge/sdk";

/**
 * Everything the shared dispatcher needs to know about one command-line tool
 */
export interface ToolDefinition<C extends { action: string }> {
  bin: string;
  description: string;
  /** Name of the positional argument after the action */
  keyLabel: string;
  /** Accepted values of the positional argument, when it is a closed set */
  keyValues?: readonly string[];
  service: ServiceConfig;
  actions: readonly ActionDefinition[];
  examples: readonly string[];
  decode(action: string, key: string | undefined, bag: ParameterBag): C;
  execute(client: RestClient, command: C): Promise<unknown>;
}

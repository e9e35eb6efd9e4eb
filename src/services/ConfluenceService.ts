import { Service, type IAgentRuntime } from "@elizaos/core";

import { getConfluenceConfig } from "../config/ConfluenceConfig";
import { createLogger } from "../utils/logger";
import { ConfluenceRagPipeline } from "./ConfluenceRagPipeline";

/**
 * ConfluenceService
 * - Owns the session's extraction pipeline (client, processor, corpus).
 * - Configured from runtime settings, then environment.
 * - Credentials are only required once a page is actually fetched, so
 *   analysis of an imported corpus works without them.
 *
 * NOTE: ElizaOS core 1.6+ requires:
 *   - static start(runtime) factory
 *   - capabilityDescription
 *   - stop()
 */
export class ConfluenceService extends Service {
  static readonly serviceType = "confluence-rag";

  override capabilityDescription =
    "Extracts Confluence pages into flat RAG documents (text, tables, code, comments) and reports corpus statistics.";

  readonly pipeline: ConfluenceRagPipeline;

  /** Required by ElizaOS core (service registration). */
  static async start(runtime: IAgentRuntime): Promise<ConfluenceService> {
    return new ConfluenceService(runtime);
  }

  constructor(runtime: IAgentRuntime) {
    super(runtime);
    this.pipeline = new ConfluenceRagPipeline({
      config: getConfluenceConfig(runtime),
      logger: createLogger({ component: "ConfluenceService", agentId: runtime.agentId }),
    });
  }

  override async stop(): Promise<void> {
    this.pipeline.clear();
  }
}

/** The running service's pipeline, or null when the service is not registered. */
export function getPipeline(runtime: IAgentRuntime): ConfluenceRagPipeline | null {
  const service = runtime.getService<ConfluenceService>(ConfluenceService.serviceType);
  return service?.pipeline ?? null;
}

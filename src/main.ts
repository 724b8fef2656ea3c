import 'dotenv/config';
import { createLogger } from '@/observability/logger.js';
import { loadEnvironment, loadHuddleConfig, emptyConfig } from '@/config/loader.js';
import { createAgentConnector } from '@/mcp/agent-connector.js';
import { createCoordinator } from '@/coordination/coordinator.js';
import { createCoordinatorAgent } from '@/coordination/coordinator-tools.js';
import { createAnthropicProvider } from '@/providers/anthropic.js';
import { createOrchestrator } from '@/orchestration/orchestrator.js';
import type { LocalAgent } from '@/orchestration/orchestrator.js';
import { createSlackClient } from '@/channels/slack/slack-client.js';
import { createMentionHandler } from '@/channels/slack/mention-handler.js';
import { createApiServer } from '@/api/server.js';
import type { RouteDependencies } from '@/api/types.js';

const logger = createLogger();

async function start(): Promise<void> {
  try {
    const envResult = loadEnvironment();
    if (!envResult.ok) {
      logger.fatal(envResult.error.message, {
        component: 'main',
        ...envResult.error.context,
      });
      process.exit(1);
    }
    const env = envResult.value;

    // Missing or invalid configuration leaves the orchestrator without agents
    const configResult = await loadHuddleConfig(env.HUDDLE_CONFIG_PATH);
    let config = emptyConfig();
    if (configResult.ok) {
      config = configResult.value;
    } else {
      logger.error('Configuration could not be loaded, starting with no agents', {
        component: 'main',
        error: configResult.error.message,
        ...configResult.error.context,
      });
    }

    // External agents
    const connector = createAgentConnector({
      timeoutMs: config.orchestration.connectTimeoutMs,
      logger,
    });
    const summary = await connector.connectAll(config.agents);
    logger.info('Agents connected', {
      component: 'main',
      connected: summary.connected,
      failed: summary.failed,
    });

    // In-process coordinator, unless the configuration runs it as its own agent
    const coordinator = createCoordinator({ logger });
    const coordinatorId = config.routing.coordinatorAgentId;
    const localAgents: LocalAgent[] = config.agents.some((agent) => agent.id === coordinatorId)
      ? []
      : [
          {
            provider: createCoordinatorAgent(coordinator, { agentId: coordinatorId, logger }),
            capabilities: ['inter-agent messaging', 'task coordination', 'workflow orchestration'],
          },
        ];

    const orchestrator = createOrchestrator({
      connector,
      provider: createAnthropicProvider({
        apiKey: env.ANTHROPIC_API_KEY,
        model: config.orchestration.model,
      }),
      routing: config.routing,
      orchestration: config.orchestration,
      agents: config.agents.map((agent) => ({
        agentId: agent.id,
        capabilities: agent.capabilities,
        ...(agent.role !== undefined && { role: agent.role }),
      })),
      localAgents,
      logger,
    });

    // Slack
    let slack: RouteDependencies['slack'];
    if (env.SLACK_BOT_TOKEN) {
      slack = {
        mentionHandler: createMentionHandler({
          client: createSlackClient({ botToken: env.SLACK_BOT_TOKEN }),
          orchestrator,
          logger,
        }),
        signingSecret: env.SLACK_SIGNING_SECRET,
      };
      if (!env.SLACK_SIGNING_SECRET) {
        logger.warn('SLACK_SIGNING_SECRET not set, Slack requests are not verified', {
          component: 'main',
        });
      }
      logger.info('Slack events enabled', { component: 'main' });
    }

    const server = await createApiServer({
      orchestrator,
      connector,
      coordinator,
      localAgents,
      slack,
      logger,
    });

    // Graceful shutdown
    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down...', { component: 'main' });
      await server.close();
      await connector.disconnectAll();
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());

    await server.listen({ port: env.PORT, host: env.HOST });
    logger.info(`Server listening on ${env.HOST}:${env.PORT}`, { component: 'main' });
  } catch (error: unknown) {
    logger.fatal('Failed to start server', {
      component: 'main',
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

void start();

#!/usr/bin/env node
import { createServer } from 'node:http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ErrorCode,
  type CallToolRequest,
} from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { themeLabel } from './constants/taxonomy.js';
import { PipelineError, ScoringError } from './errors.js';
import {
  RunCycleResultSchema,
  ScoreArticleInputSchema,
  ScoreArticleResultSchema,
  TopArticlesInputSchema,
  TopArticlesResultSchema,
  toToolSchema,
  type RunCycleResult,
  type TopArticlesResult,
} from './schemas/articles.js';
import { readTopArticles, runCycle } from './services/pipeline.js';
import { scoreArticle } from './services/scoring.js';
import { getConfig } from './config.js';
import { logger } from './logger.js';

const config = getConfig();

const server = new Server(
  {
    name: 'macro-pulse',
    version: '0.1.0',
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

server.onerror = (error: Error) => logger.error({ err: error }, 'Unhandled MCP error');

process.on('SIGINT', () => {
  logger.info('SIGINT received, closing server');
  server
    .close()
    .catch((err: unknown) => logger.error({ err }, 'Error while closing server'))
    .finally(() => process.exit(0));
});

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: [
    {
      name: 'score_article',
      description:
        'Score one article against the macro taxonomy: relevance, sentiment, critical themes and combined score (no corpus normalization).',
      inputSchema: toToolSchema(ScoreArticleInputSchema),
      outputSchema: toToolSchema(ScoreArticleResultSchema),
    },
    {
      name: 'top_articles',
      description: 'Highest-scoring articles of the stored 7-day corpus, as of the last cycle.',
      inputSchema: toToolSchema(TopArticlesInputSchema),
      outputSchema: toToolSchema(TopArticlesResultSchema),
    },
    {
      name: 'run_cycle',
      description: 'Fetch feeds, update the corpus, rescore everything and dispatch alerts for new articles.',
      inputSchema: { type: 'object' as const, properties: {}, required: [] },
      outputSchema: toToolSchema(RunCycleResultSchema),
    },
  ],
}));

server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
  try {
    switch (request.params.name) {
      case 'score_article': {
        const input = ScoreArticleInputSchema.parse(request.params.arguments ?? {});
        const scored = scoreArticle({
          source: '',
          title: input.title,
          link: '',
          published_date: '',
          scrape_timestamp: new Date().toISOString(),
          content: input.content,
        });
        const result = ScoreArticleResultSchema.parse({
          ...scored,
          theme_labels: scored.themes.map(themeLabel),
        });

        return {
          content: [{ type: 'text', text: formatScoreSummary(input.title, result.score_combined, result.sentiment_label, result.theme_labels) }],
          structuredContent: result,
        };
      }
      case 'top_articles': {
        const input = TopArticlesInputSchema.parse(request.params.arguments ?? {});
        const result = TopArticlesResultSchema.parse(
          await readTopArticles({ limit: input.limit, relevantOnly: input.relevantOnly, config }),
        );

        return {
          content: [{ type: 'text', text: formatTopSummary(result) }],
          structuredContent: result,
        };
      }
      case 'run_cycle': {
        const result = RunCycleResultSchema.parse(await runCycle({ config }));

        return {
          content: [{ type: 'text', text: formatCycleSummary(result) }],
          structuredContent: result,
        };
      }
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${request.params.name}`);
    }
  } catch (error: unknown) {
    if (error instanceof McpError) {
      throw error;
    }
    if (error instanceof ZodError) {
      throw new McpError(ErrorCode.InvalidParams, error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
    }
    if (error instanceof ScoringError) {
      throw new McpError(ErrorCode.InvalidParams, error.message, error.details);
    }
    if (error instanceof PipelineError) {
      logger.error({ err: error, code: error.code }, 'Pipeline failure');
      throw new McpError(ErrorCode.InternalError, error.message);
    }
    logger.error({ err: error }, 'Unexpected tool invocation failure');
    throw new McpError(ErrorCode.InternalError, error instanceof Error ? error.message : 'Unexpected error');
  }
});

async function start() {
  logger.info(
    { transport: config.transport, dataFile: config.dataFile, dashboardFile: config.dashboardFile, alerts: config.alerts },
    'Configuration loaded',
  );

  if (config.transport === 'http') {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });
    await server.connect(transport);

    const allowedHosts = new Set(config.allowedHosts);
    const allowedOrigins = new Set(config.allowedOrigins);

    const httpServer = createServer((req, res) => {
      if (req.method === 'GET' && req.url === '/healthz') {
        res.statusCode = 200;
        res.end('ok');
        return;
      }

      if (!isHostAllowed(req.headers.host, allowedHosts)) {
        res.statusCode = 403;
        res.end('Forbidden host');
        return;
      }
      if (!isOriginAllowed(req.headers.origin, allowedOrigins)) {
        res.statusCode = 403;
        res.end('Forbidden origin');
        return;
      }

      transport.handleRequest(req, res).catch((err: unknown) => {
        logger.error({ err }, 'HTTP transport error');
        if (!res.headersSent) {
          res.statusCode = 500;
          res.end('Internal Server Error');
        }
      });
    });

    httpServer.listen(config.port, config.httpHost, () => {
      logger.info({ transport: 'http', host: config.httpHost, port: config.port }, 'Macro Pulse server listening');
    });
  } else {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info({ transport: 'stdio' }, 'Macro Pulse server listening');
  }
}

function isHostAllowed(hostHeader: string | undefined, whitelist: Set<string>): boolean {
  if (!whitelist.size || !hostHeader) return true;
  const host = hostHeader.split(':')[0];
  return whitelist.has(host);
}

function isOriginAllowed(originHeader: string | undefined, whitelist: Set<string>): boolean {
  if (!whitelist.size || !originHeader) return true;
  return whitelist.has(originHeader);
}

function formatScoreSummary(title: string, combined: number, label: string, themes: string[]): string {
  return [
    `Macro Pulse — ${title}`,
    `Combined score: ${combined.toFixed(2)}`,
    `Sentiment: ${label}`,
    `Themes: ${themes.join(', ') || 'none'}`,
  ].join('\n');
}

function formatTopSummary(result: TopArticlesResult): string {
  if (!result.articles.length) return 'No scored articles in the corpus yet.';
  const threshold = result.alert_threshold === null ? 'n/a' : result.alert_threshold.toFixed(1);
  const lines = result.articles.map(
    (a, i) => `${i + 1}. [${a.score_normalized.toFixed(1)}] ${a.title} (${a.source})${a.is_relevant ? ' *' : ''}`,
  );
  return [`Macro Pulse — top ${result.articles.length} of ${result.corpus_size} (threshold ${threshold})`, ...lines].join('\n');
}

function formatCycleSummary(result: RunCycleResult): string {
  return [
    'Macro Pulse — cycle complete',
    `Fetched: ${result.fetched}, new: ${result.added}, corpus: ${result.corpus_size}`,
    `Alert threshold: ${result.alert_threshold === null ? 'n/a' : result.alert_threshold.toFixed(2)}`,
    `Alerts triggered: ${result.alerts_triggered}`,
  ].join('\n');
}

start().catch((error: unknown) => {
  logger.error({ err: error }, 'Failed to start Macro Pulse server');
  process.exit(1);
});

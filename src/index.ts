#!/usr/bin/env node

/**
 * Momentum MCP Server
 *
 * Scores GitHub repository momentum and tracks week-over-week trends.
 * History lives in the configured snapshot store (~/.momentum by default).
 *
 * Tools:
 *   Scoring: score_repositories
 *   History: get_trend
 *   Info:    get_capabilities
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import {
  handleScoreRepositories,
  handleGetTrend,
  handleGetCapabilities,
} from './server/tool-handlers.js';
import { VERSION } from './version.js';

const SERVER_INSTRUCTIONS = `Momentum scores GitHub repositories on short-term activity signals (commit surge, star velocity, team traction, ecosystem fit) on a 0-10 scale and tracks scores across weekly runs.

Use momentum tools when the user asks about:
- Scoring or ranking a batch of repositories, which ones qualify → score_repositories
- How a repository's score has moved over recent runs → get_trend
- Current configuration, storage, thresholds → get_capabilities`;

const server = new Server(
  { name: 'momentum', version: VERSION },
  {
    capabilities: { tools: {} },
    instructions: SERVER_INSTRUCTIONS,
  }
);

// ─── Tool Definitions ────────────────────────────────────────

server.setRequestHandler(ListToolsRequestSchema, () => {
  return {
    tools: [
      {
        name: 'score_repositories',
        description:
          'Score a batch of repository metrics for one run date, record the snapshot, and return the Markdown momentum report. One invalid record aborts the whole run.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            date: {
              type: 'string' as const,
              description: 'Run date, YYYY-MM-DD (default: today, UTC)',
            },
            repositories: {
              type: 'array' as const,
              items: { type: 'object' as const },
              description:
                'Metrics records: fullName, starsTotal, forksTotal, commits14d, featureCommits14d, starsGained14d, contributors30d [{id, commits}], primaryLanguage, topics',
            },
          },
          required: ['repositories'],
        },
      },
      {
        name: 'get_trend',
        description: "Recent scores for one repository, oldest first, from the last N runs.",
        inputSchema: {
          type: 'object' as const,
          properties: {
            fullName: {
              type: 'string' as const,
              description: 'Repository in owner/repo form',
            },
            window: {
              type: 'number' as const,
              description: 'Runs to look back over (default: configured trend window)',
            },
          },
          required: ['fullName'],
        },
      },
      {
        name: 'get_capabilities',
        description: 'Show configuration, storage, snapshot history and scoring settings.',
        inputSchema: {
          type: 'object' as const,
          properties: {},
        },
      },
    ],
  };
});

// ─── Tool Handlers ───────────────────────────────────────────

server.setRequestHandler(CallToolRequestSchema, (request) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      case 'score_repositories':
        return handleScoreRepositories(args);
      case 'get_trend':
        return handleGetTrend(args);
      case 'get_capabilities':
        return handleGetCapabilities();
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    return {
      content: [{ type: 'text' as const, text: `Error: ${errorMessage}` }],
      isError: true,
    };
  }
});

// ─── Start Server ────────────────────────────────────────────

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[momentum] MCP server v${VERSION} started`);
}

main().catch((error) => {
  console.error('[momentum] Fatal error:', error);
  process.exit(1);
});

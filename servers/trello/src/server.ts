#!/usr/bin/env node

/**
 * Trello Triage MCP Server
 * Batch criticality analysis of Trello cards with a local LLM
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { MCPResponse, MethodNotFoundError, createLogger, loadEnv, withErrorHandling } from '@card-triage/shared';

import { loadTriageConfig, TriageConfig } from './config.js';
import { openDatabase } from './database/index.js';
import { SqliteResultStore } from './database/sqlite-result-store.js';
import { OllamaClient } from './clients/ollama-client.js';
import { ChromaVectorStore } from './clients/chroma-vector-store.js';
import { TrelloClient } from './clients/trello-client.js';
import { ContextRetrieverService } from './services/criticality-analysis/services/context-retriever.service.js';
import { PromptBuilderService } from './services/criticality-analysis/services/prompt-builder.service.js';
import { CriticalityClassifierService } from './services/criticality-analysis/services/criticality-classifier.service.js';
import { BoardActionPolicyService } from './services/criticality-analysis/services/board-action-policy.service.js';
import { BoardActionExecutorService } from './services/criticality-analysis/services/board-action-executor.service.js';
import { CriticalityAnalysisPipeline } from './services/criticality-analysis/pipeline/criticality-analysis.pipeline.js';
import { StatisticsService } from './services/statistics.service.js';
import { AnalysisHandler } from './handlers/analysis.js';
import { ConfigurationHandler } from './handlers/configuration.js';
import { ToolArguments } from './handlers/base-handler.js';
import { TOOLS } from './tools.js';

const logger = createLogger('Server');

export class TrelloTriageServer {
  private server: Server;
  private store: SqliteResultStore;
  private analysisHandler: AnalysisHandler;
  private configurationHandler: ConfigurationHandler;

  constructor(config: TriageConfig) {
    this.server = new Server(
      {
        name: 'trello-triage-server',
        version: '1.0.0',
      },
      {
        capabilities: { tools: {} },
      }
    );

    this.store = new SqliteResultStore(openDatabase(config.sqlitePath));

    const ollama = new OllamaClient(config.ollama.baseUrl, config.ollama.model, config.ollama.embedModel);
    const vectorStore = ChromaVectorStore.fromConfig(config.chroma, ollama, config.retrievalTimeoutMs);
    const trello = new TrelloClient(config.trello);

    const pipeline = new CriticalityAnalysisPipeline(
      new ContextRetrieverService(
        vectorStore,
        { documents: config.chroma.documentsCollection, history: config.chroma.historyCollection },
        config.analysis
      ),
      new PromptBuilderService(config.analysis.maxFieldChars),
      new CriticalityClassifierService(ollama, config.analysis),
      this.store,
      new BoardActionPolicyService(this.store),
      new BoardActionExecutorService(trello, this.store),
      trello,
      { batchSize: config.analysis.batchSize }
    );

    this.analysisHandler = new AnalysisHandler(pipeline, new StatisticsService(this.store.statistics, this.store));
    this.configurationHandler = new ConfigurationHandler(this.store);

    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

    // Handle tool calls - delegate to appropriate handlers
    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name } = request.params;
      const args: ToolArguments = request.params.arguments ?? {};
      return withErrorHandling(() => this.dispatch(name, args));
    });
  }

  private async dispatch(name: string, args: ToolArguments): Promise<MCPResponse> {
    switch (name) {
      // Analysis operations
      case 'analyze_list':
        return this.analysisHandler.analyzeList(args);
      case 'reanalyze_card':
        return this.analysisHandler.reanalyzeCard(args);
      case 'analyze_configured_boards':
        return this.analysisHandler.analyzeConfiguredBoards();
      case 'get_card_history':
        return this.analysisHandler.getCardHistory(args);
      case 'get_analysis_statistics':
        return this.analysisHandler.getAnalysisStatistics();

      // Board configuration
      case 'configure_board':
        return this.configurationHandler.configureBoard(args);
      case 'get_board_config':
        return this.configurationHandler.getBoardConfig(args);

      default:
        throw new MethodNotFoundError(name);
    }
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    logger.info('Trello triage MCP server running on stdio');
  }

  close(): void {
    this.store.close();
  }
}

if (require.main === module) {
  loadEnv(__dirname);
  const server = new TrelloTriageServer(loadTriageConfig());
  server.run().catch((error: unknown) => {
    logger.error('Server failed to start', error);
    server.close();
    process.exit(1);
  });
}

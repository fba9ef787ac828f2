/**
 * Orchestrator
 *
 * Drives the model <-> tool cycle for one query as an explicit state machine:
 *
 *   init -> model_call -> direct_answer ---------------------> done
 *                      \-> tool_round -> model_call (tools on)
 *                                     \-> finalize (tools off) -> done
 *
 * A tool round that fails finalizes at once; a round that uses up the budget
 * finalizes with tools disabled, so the last call always yields text.
 * Completion-service failures are not caught here.
 */

import type {
  CompletionRequest,
  CompletionResponse,
  CompletionService,
  Message,
  TokenUsage,
  ToolDefinition,
  ToolResultBlock,
} from '../llm/types.js';
import { firstText, toolUseBlocks } from '../llm/types.js';
import type {
  GenerateOptions,
  OrchestratorConfig,
  OrchestratorState,
  ToolExecutor,
} from './types.js';
import { DEFAULT_ORCHESTRATOR_CONFIG, MAX_ROUNDS_SENTINEL, SKIPPED_TOOL_RESULT } from './types.js';
import type { EventEmitter } from '../events/emitter.js';
import type { AgentEvent } from '../events/types.js';
import { buildSystemPrompt } from './prompt-builder.js';
import { errorMessage } from '../errors/types.js';
import { getLogger } from '../utils/logger.js';

/**
 * Working state of one generate() call
 */
interface QueryRun {
  query: string;
  system: string;
  tools: ToolDefinition[];
  executor?: ToolExecutor;
  messages: Message[];
  modelCalls: number;
  usage: TokenUsage;
}

interface RoundOutcome {
  results: ToolResultBlock[];
  failed: boolean;
}

export class Orchestrator {
  private config: OrchestratorConfig;

  constructor(
    private completionService: CompletionService,
    private eventEmitter?: EventEmitter,
    config?: Partial<OrchestratorConfig>
  ) {
    this.config = {
      ...DEFAULT_ORCHESTRATOR_CONFIG,
      ...config,
    };
  }

  getConfig(): OrchestratorConfig {
    return { ...this.config };
  }

  /**
   * Answer a query, letting the model call tools for up to maxRounds rounds
   */
  async generate(query: string, options: GenerateOptions = {}): Promise<string> {
    const logger = getLogger();
    const startTime = Date.now();

    const run: QueryRun = {
      query,
      system: buildSystemPrompt(options.conversationHistory),
      tools: options.tools ?? [],
      executor: options.toolExecutor,
      messages: [],
      modelCalls: 0,
      usage: { inputTokens: 0, outputTokens: 0 },
    };

    this.emit({
      type: 'generate_start',
      query,
      toolsEnabled: this.toolsAvailable(run),
      timestamp: startTime,
    });

    let state: OrchestratorState = { phase: 'init' };
    let rounds = 0;

    // Every path reaches done well within this many transitions
    const maxTransitions = 4 * this.config.maxRounds + 4;

    for (let step = 0; step < maxTransitions; step++) {
      if (state.phase === 'done') {
        this.emit({
          type: 'generate_end',
          duration: Date.now() - startTime,
          rounds,
          modelCalls: run.modelCalls,
          usage: { ...run.usage },
        });
        return state.text;
      }

      if (state.phase === 'tool_round') {
        rounds = state.round;
      }

      logger.debug({ phase: state.phase }, 'Orchestrator transition');
      state = await this.advance(state, run);
    }

    logger.error({ query, rounds, modelCalls: run.modelCalls }, 'Orchestrator did not terminate');
    return MAX_ROUNDS_SENTINEL;
  }

  /**
   * Take the single exit out of the current state
   */
  private async advance(state: OrchestratorState, run: QueryRun): Promise<OrchestratorState> {
    switch (state.phase) {
      case 'init': {
        run.messages.push({ role: 'user', content: [{ type: 'text', text: run.query }] });
        return { phase: 'model_call', round: 0, toolsEnabled: this.toolsAvailable(run) };
      }

      case 'model_call': {
        const response = await this.callModel(run, state.round, state.toolsEnabled);
        if (
          state.toolsEnabled &&
          run.executor &&
          response.stopSignal === 'tool_requested' &&
          state.round < this.config.maxRounds
        ) {
          return { phase: 'tool_round', round: state.round + 1, response };
        }
        return { phase: 'direct_answer', round: state.round, response };
      }

      case 'tool_round': {
        run.messages.push({ role: 'assistant', content: state.response.content });

        const outcome = await this.executeRound(run, state.round, state.response);
        if (outcome.results.length > 0) {
          run.messages.push({ role: 'user', content: outcome.results });
        }

        // Failure is checked before the budget
        if (outcome.failed) {
          return { phase: 'finalize', round: state.round, reason: 'tool_error' };
        }
        if (state.round >= this.config.maxRounds) {
          return { phase: 'finalize', round: state.round, reason: 'budget_exhausted' };
        }
        return { phase: 'model_call', round: state.round, toolsEnabled: true };
      }

      case 'finalize': {
        getLogger().info({ reason: state.reason, rounds: state.round }, 'Finalizing without tools');
        const response = await this.callModel(run, state.round, false);
        this.emit({ type: 'finalize', reason: state.reason, rounds: state.round });
        // Tool requests in a tools-disabled answer are ignored
        return { phase: 'done', text: firstText(response.content) };
      }

      case 'direct_answer': {
        this.emit({ type: 'finalize', reason: 'direct_answer', rounds: state.round });
        return { phase: 'done', text: firstText(state.response.content) };
      }

      case 'done':
        return state;
    }
  }

  /**
   * Execute the round's tool calls in order. After the first failure the
   * remaining calls are not run and are answered as skipped.
   */
  private async executeRound(
    run: QueryRun,
    round: number,
    response: CompletionResponse
  ): Promise<RoundOutcome> {
    const results: ToolResultBlock[] = [];
    const executor = run.executor;
    if (!executor) {
      return { results, failed: false };
    }

    let failed = false;
    for (const block of toolUseBlocks(response.content)) {
      // Every tool_use id must be answered, even after a failure
      if (failed) {
        results.push({
          type: 'tool_result',
          toolUseId: block.id,
          content: SKIPPED_TOOL_RESULT,
          isError: true,
        });
        continue;
      }

      this.emit({ type: 'tool_call', round, id: block.id, name: block.name, input: block.input });
      const toolStart = Date.now();

      try {
        const content = await executor.execute(block.name, block.input);
        results.push({ type: 'tool_result', toolUseId: block.id, content, isError: false });
        this.emit({
          type: 'tool_result',
          round,
          id: block.id,
          name: block.name,
          isError: false,
          duration: Date.now() - toolStart,
        });
      } catch (error) {
        const message = errorMessage(error);
        getLogger().warn({ tool: block.name, round, error: message }, 'Tool execution failed');

        results.push({
          type: 'tool_result',
          toolUseId: block.id,
          content: `Tool execution failed: ${message}`,
          isError: true,
        });
        this.emit({
          type: 'tool_result',
          round,
          id: block.id,
          name: block.name,
          isError: true,
          duration: Date.now() - toolStart,
        });
        failed = true;
      }
    }

    return { results, failed };
  }

  private async callModel(
    run: QueryRun,
    round: number,
    toolsEnabled: boolean
  ): Promise<CompletionResponse> {
    const request: CompletionRequest = {
      // Snapshot: later rounds append to run.messages
      messages: [...run.messages],
      system: run.system,
    };
    if (toolsEnabled) {
      request.tools = run.tools;
      request.toolChoice = 'auto';
    }

    this.emit({ type: 'model_call', round, toolsEnabled });
    run.modelCalls++;
    const response = await this.completionService.complete(request);
    if (response.usage) {
      run.usage.inputTokens += response.usage.inputTokens;
      run.usage.outputTokens += response.usage.outputTokens;
    }
    return response;
  }

  private toolsAvailable(run: QueryRun): boolean {
    return run.tools.length > 0 && run.executor !== undefined;
  }

  private emit(event: AgentEvent): void {
    this.eventEmitter?.emit(event);
  }
}

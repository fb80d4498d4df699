import { InferenceBackend } from '../clients/bedrock-backend.js';
import { GenerationConfig } from '../config/environment.js';
import { ErrorContext, ErrorHandler } from '../monitoring/error-handler.js';
import { BackendError } from '../monitoring/errors.js';
import { InvocationResult } from '../types/index.js';
import { validateInputText, validateResourceId } from '../validation/validator.js';

export interface BackendProvider {
  getInferenceBackend(): InferenceBackend | null;
}

export interface BackendInvokerOptions {
  agentAliasId: string;
  generation: GenerationConfig;
}

function failure(statusCode: number, error: string, errorId?: string): InvocationResult {
  return {
    statusCode,
    body: errorId ? { error, error_id: errorId } : { error },
    cached: false
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

/**
 * Pull `results[0].outputText` out of a text-generation response, or '' when
 * the model returned no result.
 */
export function extractOutputText(responseBody: string): string {
  const parsed: unknown = JSON.parse(responseBody);
  if (typeof parsed !== 'object' || parsed === null || !('results' in parsed)) return '';

  const { results } = parsed;
  if (!Array.isArray(results) || results.length === 0) return '';

  const first: unknown = results[0];
  if (typeof first !== 'object' || first === null || !('outputText' in first)) return '';
  return typeof first.outputText === 'string' ? first.outputText : '';
}

/**
 * Calls the inference backend and turns every outcome into an
 * InvocationResult. Backend failures are logged in full under a correlation
 * id; the caller only ever sees the id.
 */
export class BackendInvoker {
  constructor(
    private readonly backends: BackendProvider,
    private readonly errorHandler: ErrorHandler,
    private readonly options: BackendInvokerOptions
  ) {}

  async invokeAgent(agentId: unknown, sessionId: string, inputText: string): Promise<InvocationResult> {
    const idCheck = validateResourceId('agent_id', agentId);
    if (!idCheck.ok || typeof agentId !== 'string') {
      return failure(400, 'Invalid agent_id');
    }

    const backend = this.backends.getInferenceBackend();
    if (!backend) {
      return failure(500, 'Inference client not initialized');
    }

    try {
      const decoder = new TextDecoder('utf-8', { fatal: true });
      let text = '';
      let dropped = 0;

      for await (const chunk of backend.streamAgent({
        agentId,
        agentAliasId: this.options.agentAliasId,
        sessionId,
        inputText
      })) {
        try {
          text += decoder.decode(chunk);
        } catch {
          dropped++;
        }
      }

      if (dropped > 0) {
        console.warn(`Dropped ${dropped} undecodable chunk(s) from agent ${agentId}`);
      }

      return { statusCode: 200, body: text, cached: false };
    } catch (error) {
      return this.backendFailure(error, 'Agent invocation failed', { agentId, sessionId });
    }
  }

  async invokeModel(modelId: unknown, prompt: unknown): Promise<InvocationResult> {
    const idCheck = validateResourceId('model_id', modelId);
    if (!idCheck.ok || typeof modelId !== 'string') {
      return failure(400, 'Invalid model_id');
    }

    const promptCheck = validateInputText(prompt);
    if (!promptCheck.ok || typeof prompt !== 'string') {
      return failure(400, promptCheck.ok ? 'Invalid input: must be a string' : promptCheck.reason);
    }

    const backend = this.backends.getInferenceBackend();
    if (!backend) {
      return failure(500, 'Inference client not initialized');
    }

    try {
      const responseBody = await backend.invokeModel({
        modelId,
        body: JSON.stringify({
          inputText: prompt,
          textGenerationConfig: { ...this.options.generation }
        })
      });

      return { statusCode: 200, body: extractOutputText(responseBody), cached: false };
    } catch (error) {
      return this.backendFailure(error, 'Model invocation failed', { modelId });
    }
  }

  private backendFailure(error: unknown, summary: string, context: ErrorContext): InvocationResult {
    const errorInfo = this.errorHandler.captureError(
      new BackendError(`${summary}: ${describeError(error)}`, { cause: error }),
      { ...context, stage: 'backend' }
    );
    return failure(500, 'Inference service error', errorInfo.id);
  }
}

/**
 * Amazon Bedrock client for the router.
 * Wraps the agent runtime (streamed agent sessions) and the model runtime
 * (single-shot foundation model calls) behind InferenceBackend.
 */

import { BedrockAgentRuntimeClient, InvokeAgentCommand } from '@aws-sdk/client-bedrock-agent-runtime';
import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';

export interface AgentRequest {
  agentId: string;
  agentAliasId: string;
  sessionId: string;
  inputText: string;
}

export interface ModelRequest {
  modelId: string;
  body: string;
}

export interface InferenceBackend {
  /** Raw completion chunks in arrival order. */
  streamAgent(request: AgentRequest): AsyncIterable<Uint8Array>;
  /** Raw JSON response body of a model call. */
  invokeModel(request: ModelRequest): Promise<string>;
  close(): void;
}

export interface BedrockBackendOptions {
  region: string;
  maxAttempts?: number;
}

export class BedrockInferenceBackend implements InferenceBackend {
  private readonly agentClient: BedrockAgentRuntimeClient;
  private readonly modelClient: BedrockRuntimeClient;

  constructor(options: BedrockBackendOptions) {
    const clientConfig = {
      region: options.region,
      maxAttempts: options.maxAttempts ?? 3
    };
    this.agentClient = new BedrockAgentRuntimeClient(clientConfig);
    this.modelClient = new BedrockRuntimeClient(clientConfig);
  }

  async *streamAgent(request: AgentRequest): AsyncGenerator<Uint8Array> {
    const response = await this.agentClient.send(
      new InvokeAgentCommand({
        agentId: request.agentId,
        agentAliasId: request.agentAliasId,
        sessionId: request.sessionId,
        inputText: request.inputText
      })
    );

    if (!response.completion) return;

    for await (const event of response.completion) {
      const bytes = event.chunk?.bytes;
      if (bytes && bytes.length > 0) {
        yield bytes;
      }
    }
  }

  async invokeModel(request: ModelRequest): Promise<string> {
    const response = await this.modelClient.send(
      new InvokeModelCommand({
        modelId: request.modelId,
        contentType: 'application/json',
        accept: 'application/json',
        body: request.body
      })
    );
    return new TextDecoder('utf-8').decode(response.body);
  }

  close(): void {
    this.agentClient.destroy();
    this.modelClient.destroy();
  }
}

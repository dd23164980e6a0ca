/**
 * Azure OpenAI deployment behind the OpenAI-compatible provider.
 * The model is addressed by deployment in the URL and authenticated with `api-key`.
 */

import type { ChatMessage, ChatRequestOptions } from "../types.js";
import { GenericProvider } from "./generic.js";

export class AzureOpenAIProvider extends GenericProvider {
  name = "azure-openai";

  constructor(
    endpoint: string,
    deployment: string,
    apiKey: string,
    protected apiVersion: string,
  ) {
    super(endpoint, deployment, apiKey);
  }

  protected _getRequestUrl(): string {
    const base = this.endpoint.replace(/\/+$/, "");
    const deployment = encodeURIComponent(this.defaultModel);
    return `${base}/openai/deployments/${deployment}/chat/completions?api-version=${encodeURIComponent(this.apiVersion)}`;
  }

  protected _getRequestHeaders(): Record<string, string> {
    return {
      "Content-Type": "application/json",
      "api-key": this.apiKey,
    };
  }

  protected _getRequestBody(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Record<string, unknown> {
    // The deployment in the URL selects the model
    const { model: _model, ...body } = super._getRequestBody(messages, options);
    return body;
  }
}

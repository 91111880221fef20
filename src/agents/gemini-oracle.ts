import axios, { AxiosInstance, AxiosError } from 'axios';
import type { Logger } from '../utils/logger';
import { createSilentLogger } from '../utils/logger';
import { ErrorAnalyzer } from './error-analyzer';
import { OracleAuthenticationError, OracleEmptyResponseError, OracleFault, OracleQuotaError, OracleTransportError } from './errors';
import { FENCE_LANGUAGES, getCorrectionPrompt, getInitialPrompt, getSystemPrompt } from './prompts/code-generation';
import { parseGeneration } from './response-parser';
import type { Generation, GenerationOracle, GenerationRequest } from './types';

export interface GeminiOracleOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  temperature?: number;
  timeoutMs?: number;
  logger?: Logger;
}

type GeminiGenerateContentResponse = {
  candidates?: Array<{
    finishReason?: string;
    content?: {
      parts?: Array<{ text?: string }>;
    };
  }>;
  promptFeedback?: {
    blockReason?: string;
  };
};

/** Translate an axios failure into the oracle fault taxonomy */
export function toOracleFault(error: AxiosError): OracleFault {
  const response = error.response;
  if (!response) {
    return new OracleTransportError(`Network error: ${error.message}`, undefined, error);
  }

  switch (response.status) {
    case 401:
    case 403:
      return new OracleAuthenticationError(`Generation backend rejected the credentials (${response.status})`, response.status);
    case 429:
      return new OracleQuotaError();
    default:
      return new OracleTransportError(`Generation backend error ${response.status} ${response.statusText}`.trim(), response.status, error);
  }
}

/**
 * Code-generation oracle backed by the Gemini `generateContent` REST API.
 * Stateless: every request carries the full context it needs.
 */
export class GeminiOracle implements GenerationOracle {
  private axiosInstance: AxiosInstance;
  private model: string;
  private temperature: number;
  private analyzer = new ErrorAnalyzer();
  private logger: Logger;

  constructor(options: GeminiOracleOptions) {
    if (!options.apiKey) {
      throw new OracleAuthenticationError('GEMINI_API_KEY is required for authentication');
    }

    this.model = options.model;
    this.temperature = options.temperature ?? 0.2;
    this.logger = options.logger ?? createSilentLogger();
    this.axiosInstance = axios.create({
      baseURL: options.baseUrl || 'https://generativelanguage.googleapis.com/v1beta',
      timeout: options.timeoutMs || 60_000,
      headers: {
        'Content-Type': 'application/json',
        'x-goog-api-key': options.apiKey,
      },
    });

    this.axiosInstance.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => Promise.reject(toOracleFault(error)),
    );
  }

  async generate(request: GenerationRequest): Promise<Generation> {
    const prompt = this.buildPrompt(request);
    this.logger.debug('Calling Gemini', { model: this.model, attempt: request.attempt, promptChars: prompt.length });

    const { data } = await this.axiosInstance.post<GeminiGenerateContentResponse>(`/models/${encodeURIComponent(this.model)}:generateContent`, {
      systemInstruction: { parts: [{ text: getSystemPrompt(request.runtime) }] },
      contents: [{ role: 'user', parts: [{ text: prompt }] }],
      generationConfig: { temperature: this.temperature },
    });

    const text =
      data.candidates?.[0]?.content?.parts
        ?.map((p) => p.text)
        .filter(Boolean)
        .join('') ?? '';

    if (!text.trim()) {
      throw new OracleEmptyResponseError(data.promptFeedback?.blockReason ?? data.candidates?.[0]?.finishReason);
    }

    return parseGeneration(text, FENCE_LANGUAGES[request.runtime]);
  }

  private buildPrompt(request: GenerationRequest): string {
    if (!request.previous) {
      return getInitialPrompt(request.problem, request.runtime);
    }
    const analysis = this.analyzer.analyze(request.previous.stdout, request.previous.stderr);
    return getCorrectionPrompt(request.problem, request.previous, analysis, request.runtime);
  }
}

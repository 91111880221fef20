import fs from 'fs/promises';
import path from 'path';
import axios, { AxiosInstance, AxiosError } from 'axios';
import { toOracleFault } from './gemini-oracle';

export interface IllustrationContext {
  sessionId: string;
  attempt: number;
}

/** Turns a rationale into an image file. Returns the file location, or undefined when nothing was produced. */
export interface Illustrator {
  illustrate(rationale: string, context: IllustrationContext): Promise<string | undefined>;
}

export interface GeminiImageIllustratorOptions {
  apiKey: string;
  model: string;
  outputDir: string;
  baseUrl?: string;
  timeoutMs?: number;
}

type ImagenPredictResponse = {
  predictions?: Array<{
    bytesBase64Encoded?: string;
    mimeType?: string;
  }>;
};

/** Longest rationale excerpt sent to the image model */
const MAX_PROMPT_IDEA_CHARS = 600;

export function buildIllustrationPrompt(rationale: string): string {
  const idea = rationale.replace(/\s+/g, ' ').trim().slice(0, MAX_PROMPT_IDEA_CHARS);
  return "Digital art, an abstract and minimalistic visualization of an AI agent's thought. " + `Nodes, glowing connections, logic flows, representing the idea: '${idea}'.`;
}

/** Illustrator backed by the Imagen `predict` endpoint of the Gemini API */
export class GeminiImageIllustrator implements Illustrator {
  private axiosInstance: AxiosInstance;
  private model: string;
  private imagesDir: string;

  constructor(options: GeminiImageIllustratorOptions) {
    this.model = options.model;
    this.imagesDir = path.join(options.outputDir, 'images');
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

  async illustrate(rationale: string, context: IllustrationContext): Promise<string | undefined> {
    if (!rationale.trim()) return undefined;

    const { data } = await this.axiosInstance.post<ImagenPredictResponse>(`/models/${encodeURIComponent(this.model)}:predict`, {
      instances: [{ prompt: buildIllustrationPrompt(rationale) }],
      parameters: { sampleCount: 1 },
    });

    const encoded = data.predictions?.[0]?.bytesBase64Encoded;
    if (!encoded) return undefined;

    await fs.mkdir(this.imagesDir, { recursive: true });
    const filePath = path.join(this.imagesDir, `session_${context.sessionId}_attempt_${context.attempt}.png`);
    await fs.writeFile(filePath, Buffer.from(encoded, 'base64'));
    return filePath;
  }
}

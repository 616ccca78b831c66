import type { Readable } from "node:stream";
import { HttpService } from "@nestjs/axios";
import { Injectable, Logger, type OnModuleDestroy } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { anySignal } from "any-signal";
import { type AxiosRequestConfig, isAxiosError } from "axios";
import { firstValueFrom } from "rxjs";
import { Agent, request as undiciRequest } from "undici";
import { toStructuredError } from "../common/logging.js";
import type { IConfig } from "../config/app.config.js";
import {
  type HttpVersion,
  parseContentLength,
  type ProbeRequestOptions,
  type ProbeResponse,
  ProbeTimeoutError,
} from "./types.js";

const DEFAULT_BODY_PREVIEW_LIMIT = 1024;
const GET_MAX_REDIRECTS = 5;

const isSuccessStatus = (statusCode: number): boolean => statusCode >= 200 && statusCode < 300;

type BodyStream = AsyncIterable<unknown> & { destroy(error?: Error): unknown };

/**
 * Reads at most `limit` characters from a response body, then releases it.
 */
export async function readBodyPreview(body: BodyStream, limit: number): Promise<string> {
  const decoder = new TextDecoder();
  let preview = "";
  try {
    for await (const chunk of body) {
      if (typeof chunk === "string") {
        preview += chunk;
      } else if (chunk instanceof Uint8Array) {
        preview += decoder.decode(chunk, { stream: true });
      }
      if (preview.length >= limit) {
        break;
      }
    }
  } finally {
    body.destroy();
  }
  return preview.slice(0, limit);
}

@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly logger = new Logger(HttpClientService.name);
  private readonly defaultTimeoutMs: number;
  private readonly httpVersion: HttpVersion;
  private readonly userAgent: string;
  private http2Agent: Agent | null = null;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService<IConfig, true>,
  ) {
    const probeConfig = this.configService.get("probe");
    this.defaultTimeoutMs = probeConfig.requestTimeoutMs;
    this.httpVersion = probeConfig.httpVersion;
    this.userAgent = probeConfig.userAgent;
  }

  async onModuleDestroy(): Promise<void> {
    if (this.http2Agent) {
      await this.http2Agent.close();
      this.http2Agent = null;
    }
  }

  /**
   * Issues one probe request. Resolves for every HTTP status code; rejects with
   * {@link ProbeTimeoutError} on timeout and with the transport error otherwise.
   */
  async probe(url: string, options: ProbeRequestOptions, signal?: AbortSignal): Promise<ProbeResponse> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const headers = {
      "User-Agent": this.userAgent,
      "Accept-Encoding": "identity",
      ...options.headers,
    };
    const previewLimit = options.bodyPreviewLimit ?? DEFAULT_BODY_PREVIEW_LIMIT;

    try {
      this.logger.debug(`${options.method} ${url} via HTTP/${this.httpVersion}`);
      if (this.httpVersion === "2") {
        return await this.probeWithHttp2(url, options, headers, timeoutMs, previewLimit, signal);
      }
      return await this.probeWithHttp1(url, options, headers, timeoutMs, previewLimit, signal);
    } catch (error) {
      this.logger.debug({
        event: "probe_request_failed",
        message: `${options.method} ${url} failed`,
        url,
        method: options.method,
        error: toStructuredError(error),
      });
      throw error;
    }
  }

  /**
   * HTTP/1.1 request using axios
   */
  private async probeWithHttp1(
    url: string,
    options: ProbeRequestOptions,
    headers: Record<string, string>,
    timeoutMs: number,
    previewLimit: number,
    parentSignal?: AbortSignal,
  ): Promise<ProbeResponse> {
    const startTime = performance.now();
    const timeoutSignal = AbortSignal.timeout(timeoutMs);
    const signal = parentSignal ? anySignal([timeoutSignal, parentSignal]) : timeoutSignal;

    const config: AxiosRequestConfig = {
      method: options.method,
      url,
      headers,
      timeout: timeoutMs,
      signal,
      maxRedirects: options.method === "GET" ? GET_MAX_REDIRECTS : 0,
      responseType: "stream",
      decompress: false,
      validateStatus: () => true,
    };

    try {
      const response = await firstValueFrom(this.httpService.request<Readable>(config));
      const statusCode = response.status;
      const body = response.data;

      let bodyPreview: string | null = null;
      if (options.method === "GET" && !isSuccessStatus(statusCode)) {
        bodyPreview = await readBodyPreview(body, previewLimit);
      } else {
        body.destroy();
      }

      return {
        statusCode,
        contentLength: parseContentLength(response.headers["content-length"]),
        bodyPreview,
        httpVersion: "1.1",
        elapsedMs: Math.round(performance.now() - startTime),
      };
    } catch (error) {
      if (timeoutSignal.aborted || (isAxiosError(error) && error.code === "ECONNABORTED")) {
        throw new ProbeTimeoutError(url, timeoutMs);
      }
      throw error;
    } finally {
      if ("clear" in signal && typeof signal.clear === "function") {
        signal.clear();
      }
    }
  }

  /**
   * HTTP/2 request using undici
   */
  private async probeWithHttp2(
    url: string,
    options: ProbeRequestOptions,
    headers: Record<string, string>,
    timeoutMs: number,
    previewLimit: number,
    parentSignal?: AbortSignal,
  ): Promise<ProbeResponse> {
    const startTime = performance.now();
    const timeoutSignal = AbortSignal.timeout(timeoutMs);
    const signal = parentSignal ? anySignal([timeoutSignal, parentSignal]) : timeoutSignal;

    try {
      const response = await undiciRequest(url, {
        method: options.method,
        headers,
        signal,
        dispatcher: this.getHttp2Agent(),
      });

      let bodyPreview: string | null = null;
      if (options.method === "GET" && !isSuccessStatus(response.statusCode)) {
        bodyPreview = await readBodyPreview(response.body, previewLimit);
      } else {
        response.body.destroy();
      }

      return {
        statusCode: response.statusCode,
        contentLength: parseContentLength(response.headers["content-length"]),
        bodyPreview,
        httpVersion: "2",
        elapsedMs: Math.round(performance.now() - startTime),
      };
    } catch (error) {
      if (timeoutSignal.aborted) {
        throw new ProbeTimeoutError(url, timeoutMs);
      }
      throw error;
    } finally {
      if ("clear" in signal && typeof signal.clear === "function") {
        signal.clear();
      }
    }
  }

  private getHttp2Agent(): Agent {
    if (!this.http2Agent) {
      this.http2Agent = new Agent({ allowH2: true });
    }
    return this.http2Agent;
  }
}

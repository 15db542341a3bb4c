import axios, { type AxiosRequestConfig } from "axios";

export interface ClientConfig {
  /** Base URL for the API server (e.g., "http://localhost:3000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
}

export interface RequestParams {
  path?: string;
  body?: unknown;
  query?: Record<string, unknown>;
}

/** A failed request, with the server's status and message when it sent one */
export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    readonly body: unknown,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

function messageOf(body: unknown): string | null {
  if (body !== null && typeof body === "object") {
    const message: unknown = Reflect.get(body, "message");
    if (typeof message === "string") return message;
  }
  return null;
}

/** Normalize any request failure into an ApiError. */
export function toApiError(err: unknown): ApiError {
  if (err instanceof ApiError) return err;
  if (axios.isAxiosError(err)) {
    const status = err.response?.status ?? null;
    const body: unknown = err.response?.data;
    const message = messageOf(body) ?? err.message;
    return new ApiError(status === null ? message : `${status}: ${message}`, status, body);
  }
  return new ApiError(err instanceof Error ? err.message : String(err), null, undefined);
}

export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 30000;
  }

  protected buildPath(params: RequestParams): string {
    return params.path ? this.resource + "/" + params.path : this.resource;
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
    };

    if (params.query) {
      config.params = params.query;
    }

    return config;
  }

  public async get<T>(params: RequestParams = {}): Promise<T> {
    try {
      const response = await axios.get<T>(this.buildPath(params), this.buildConfig(params));
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }

  public async post<T>(params: RequestParams = {}): Promise<T> {
    try {
      const response = await axios.post<T>(this.buildPath(params), params.body, this.buildConfig(params));
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }
}

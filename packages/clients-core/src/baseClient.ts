import axios, { type AxiosRequestConfig, type Method } from "axios";
import { ApiError } from "./errors.js";

export interface ClientConfig {
  /** Base URL of the API including its version prefix (e.g., "https://api.openstreetmap.org/api/0.6") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 120000) */
  timeout?: number;
  /** Pre-formed Authorization header value (e.g., "Basic dXNlcjpwYXNz") */
  authorization?: string;
  /** User-agent string */
  userAgent?: string;
}

export interface RequestParams {
  path?: string;
  /** XML payload */
  body?: string;
  query?: Record<string, string | number>;
}

/**
 * Thin axios wrapper for one resource of an XML API.
 *
 * Responses are returned as raw text; any non-2xx status becomes an ApiError
 * carrying the status and body.
 */
export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;
  protected authorization?: string;
  protected userAgent?: string;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 120000;
    this.authorization = config.authorization;
    this.userAgent = config.userAgent;
  }

  /** Update the Authorization header (e.g., after the credential prompt) */
  public setAuthorization(authorization: string | undefined): void {
    this.authorization = authorization;
  }

  protected buildPath(params: RequestParams): string {
    return params.path ? this.resource + "/" + params.path : this.resource;
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      responseType: "text",
      // Status is checked by hand so the body survives into ApiError
      validateStatus: () => true,
      headers: {
        "Content-Type": "application/xml",
      },
    };

    if (this.authorization) {
      config.headers = {
        ...config.headers,
        Authorization: this.authorization,
      };
    }

    if (this.userAgent) {
      config.headers = {
        ...config.headers,
        "User-Agent": this.userAgent,
      };
    }

    if (params.query) {
      config.params = params.query;
    }

    return config;
  }

  protected async request(method: Method, params: RequestParams): Promise<string> {
    const path = this.buildPath(params);
    const response = await axios.request<string>({
      ...this.buildConfig(params),
      method,
      url: path,
      data: params.body,
    });
    const body = response.data ?? "";

    if (response.status < 200 || response.status >= 300) {
      throw new ApiError(method.toUpperCase(), path, response.status, body);
    }
    return body;
  }

  public async get(params: RequestParams = {}): Promise<string> {
    return this.request("get", params);
  }

  public async post(params: RequestParams = {}): Promise<string> {
    return this.request("post", params);
  }

  public async put(params: RequestParams = {}): Promise<string> {
    return this.request("put", params);
  }
}

import type { ApiResponse, FormDefinitionResponse, FormSubmitResponse } from '@formveil/shared';
import { API_PATHS } from '@formveil/shared';

const API_BASE = import.meta.env.VITE_API_BASE_URL ?? '';

type HttpMethod = 'GET' | 'POST';

interface RequestOptions {
  method?: HttpMethod;
  body?: unknown;
}

export class ApiClient {
  private async request<T>(path: string, options: RequestOptions = {}): Promise<T> {
    const { method = 'GET', body } = options;

    const res = await fetch(`${API_BASE}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    const json: ApiResponse<T> = await res.json();

    if (!res.ok || !json.success || json.data === undefined) {
      throw new ApiError(json.error ?? `HTTP ${res.status}`, res.status);
    }

    return json.data;
  }

  async getForm(formId: string): Promise<FormDefinitionResponse> {
    return this.request<FormDefinitionResponse>(`${API_PATHS.FORM}/${encodeURIComponent(formId)}`);
  }

  async submitForm(formId: string, submission: Record<string, string>): Promise<FormSubmitResponse> {
    return this.request<FormSubmitResponse>(`${API_PATHS.FORM}/${encodeURIComponent(formId)}`, {
      method: 'POST',
      body: submission,
    });
  }
}

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export const api = new ApiClient();

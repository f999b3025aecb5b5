import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface FakeReply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export interface FakeRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  body: unknown;
}

/**
 * An axios instance whose adapter answers from `handler` instead of the
 * network. Non-2xx replies reject with a real `AxiosError`; a `null` reply
 * simulates a connection failure.
 */
export function fakeAxios(handler: (request: FakeRequest) => FakeReply | null): {
  client: AxiosInstance;
  requests: FakeRequest[];
} {
  const requests: FakeRequest[] = [];
  const client = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
      const request: FakeRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        params: config.params ?? {},
        body,
      };
      requests.push(request);

      const reply = handler(request);
      if (reply === null) {
        throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
      }
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: reply.headers ?? {},
        config,
      };
      if (reply.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${reply.status}`,
          AxiosError.ERR_BAD_REQUEST,
          config,
          null,
          response,
        );
      }
      return response;
    },
  });
  return { client, requests };
}

/**
 * HTTP Client
 * Axios wrapper that attaches a fresh proxy token to every request
 */

import axios, {
    type AxiosAdapter,
    type AxiosInstance,
    type AxiosRequestConfig,
    type AxiosResponse,
} from 'axios';

export interface TokenProvider {
    getValidToken(): Promise<string>;
}

export type AuthorizationHeader = 'Authorization' | 'Proxy-Authorization';

export interface HttpClientConfig {
    baseUrl: string;
    tokenProvider: TokenProvider;
    /**
     * Header carrying the proxy token. Use Proxy-Authorization when the
     * backend behind the proxy reads its own Authorization header.
     */
    authorizationHeader?: AuthorizationHeader;
    timeout?: number;
    adapter?: AxiosAdapter;
}

export class HttpClient {
    private readonly client: AxiosInstance;
    private readonly tokenProvider: TokenProvider;
    private readonly authorizationHeader: AuthorizationHeader;

    constructor(config: HttpClientConfig) {
        this.tokenProvider = config.tokenProvider;
        this.authorizationHeader = config.authorizationHeader ?? 'Authorization';

        this.client = axios.create({
            baseURL: config.baseUrl.replace(/\/+$/, ''),
            timeout: config.timeout || 30000,
            headers: {
                'Content-Type': 'application/json',
            },
            ...(config.adapter ? { adapter: config.adapter } : {}),
        });

        // Add auth interceptor
        this.client.interceptors.request.use(async (requestConfig) => {
            const token = await this.tokenProvider.getValidToken();
            requestConfig.headers.set(this.authorizationHeader, `Bearer ${token}`);
            return requestConfig;
        });
    }

    async request<T = unknown>(config: AxiosRequestConfig): Promise<T> {
        const response: AxiosResponse<T> = await this.client.request(config);
        return response.data;
    }

    async get<T = unknown>(url: string, config?: AxiosRequestConfig): Promise<T> {
        return this.request<T>({ ...config, method: 'GET', url });
    }

    async post<T = unknown>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T> {
        return this.request<T>({ ...config, method: 'POST', url, data });
    }

    async patch<T = unknown>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T> {
        return this.request<T>({ ...config, method: 'PATCH', url, data });
    }

    async delete<T = unknown>(url: string, config?: AxiosRequestConfig): Promise<T> {
        return this.request<T>({ ...config, method: 'DELETE', url });
    }
}

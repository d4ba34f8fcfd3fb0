import axios, { AxiosRequestConfig, AxiosResponse } from 'axios';

/**
 * HTTP client abstraction interface for testability
 */
export interface IHttpClient {
    request<T = unknown>(config: AxiosRequestConfig): Promise<AxiosResponse<T>>;
}

/**
 * Default implementation using axios
 */
export class AxiosHttpClient implements IHttpClient {
    async request<T = unknown>(config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
        return axios.request<T>(config);
    }
}

export type { AxiosRequestConfig, AxiosResponse } from 'axios';

import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';

export function axiosResponse<T>(data: T, status = 200): AxiosResponse<T> {
  return {
    data,
    status,
    statusText: 'OK',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

export function axiosTimeout(): AxiosError {
  return new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED');
}

export function axiosHttpError(status: number): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(
    `Request failed with status code ${status}`,
    'ERR_BAD_RESPONSE',
    config,
    null,
    { data: {}, status, statusText: 'Error', headers: {}, config },
  );
}

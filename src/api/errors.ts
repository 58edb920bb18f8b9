import { truncate } from '../utils/records';

export type ApiErrorKind =
  | 'ProviderNotConfigured'
  | 'UpstreamError'
  | 'UpstreamUnreachable'
  | 'BadRequest'
  | 'NotFound'
  | 'Internal';

/**
 * Falha já classificada. Atravessa as camadas sem ser reescrita: a rota só
 * converte em resposta HTTP o que ainda não for um `ApiError`.
 *
 * `UpstreamError` leva o corpo da resposta do provedor sem filtro, para
 * depuração. Se a API for exposta a clientes não confiáveis, esse corpo
 * precisa ser sanitizado antes.
 */
export class ApiError extends Error {
  constructor(
    public readonly kind: ApiErrorKind,
    public readonly status: number,
    public readonly detail: string
  ) {
    super(detail);
    this.name = 'ApiError';
  }

  static providerNotConfigured(detail: string): ApiError {
    return new ApiError('ProviderNotConfigured', 501, detail);
  }

  static upstream(status: number, body: string): ApiError {
    return new ApiError('UpstreamError', status, body);
  }

  static unreachable(reason: string): ApiError {
    return new ApiError('UpstreamUnreachable', 500, truncate(reason));
  }

  static badRequest(detail: string): ApiError {
    return new ApiError('BadRequest', 400, detail);
  }

  static notFound(detail: string): ApiError {
    return new ApiError('NotFound', 404, detail);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Tudo que não foi classificado vira 500 com a mensagem cortada em 200 caracteres. */
export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) return error;
  return new ApiError('Internal', 500, truncate(describeError(error)));
}

export interface ErrorResponse {
  status: number;
  body: { error: ApiErrorKind; detail: string };
}

export function toErrorResponse(error: unknown): ErrorResponse {
  const apiError = toApiError(error);
  return {
    status: apiError.status,
    body: { error: apiError.kind, detail: apiError.detail }
  };
}

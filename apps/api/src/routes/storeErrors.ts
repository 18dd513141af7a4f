import type { StoreError, StoreErrorKind } from '../store/documentStore.js';

const STATUS_BY_KIND: Record<StoreErrorKind, number> = {
  InvalidIdentifier: 400,
  NotFound: 404,
  StoreUnavailable: 503,
  WriteError: 503
};

const CODE_BY_KIND: Record<StoreErrorKind, string> = {
  InvalidIdentifier: 'INVALID_ID',
  NotFound: 'NOT_FOUND',
  StoreUnavailable: 'STORE_UNAVAILABLE',
  WriteError: 'WRITE_FAILED'
};

export function storeErrorResponse(error: StoreError): { status: number; body: { error: string; message: string } } {
  return {
    status: STATUS_BY_KIND[error.kind],
    body: { error: CODE_BY_KIND[error.kind], message: error.message }
  };
}

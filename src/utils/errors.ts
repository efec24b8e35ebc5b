/**
 * Felhierarki för tjänsten
 *
 * Varje fel bär en HTTP-status och en maskinläsbar kod som
 * felhanteraren i Express skickar vidare i `{ success: false, error, code }`.
 */

export class AppError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

/** Negativt eller icke-ändligt intäktsmål */
export class InvalidTargetError extends AppError {
  constructor(target: number) {
    super(`Ogiltigt mål: ${target}. Målet måste vara ett ändligt tal >= 0`, 400, 'INVALID_TARGET');
  }
}

export class FarmNotFoundError extends AppError {
  constructor(farmId: string) {
    super(`Gård med id '${farmId}' hittades inte`, 404, 'FARM_NOT_FOUND');
  }
}

export class UnknownProductError extends AppError {
  constructor(productId: string) {
    super(`Produkt med id '${productId}' finns inte i katalogen`, 404, 'UNKNOWN_PRODUCT');
  }
}

export class StockEntryNotFoundError extends AppError {
  constructor(productId: string) {
    super(`Produkt '${productId}' finns inte i lagret`, 404, 'STOCK_ENTRY_NOT_FOUND');
  }
}

export class DuplicateStockEntryError extends AppError {
  constructor(productId: string) {
    super(`Produkt '${productId}' finns redan i lagret`, 409, 'DUPLICATE_STOCK_ENTRY');
  }
}

export class NoPlanError extends AppError {
  constructor() {
    super('Det finns ingen plan att tillämpa', 409, 'NO_PLAN');
  }
}

export class InvalidFarmNameError extends AppError {
  constructor() {
    super('Gårdens namn får inte vara tomt', 400, 'INVALID_FARM_NAME');
  }
}

/** Fel från fil- eller Supabase-lagringen */
export class StorageError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, 'STORAGE_ERROR');
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/** Helper to extract error message from unknown error */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

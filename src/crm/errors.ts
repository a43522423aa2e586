export class CrmHttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string
  ) {
    super(`CRM responded ${status}: ${body.slice(0, 500)}`);
    this.name = "CrmHttpError";
  }
}

export class CrmTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`CRM request timed out after ${timeoutMs}ms`);
    this.name = "CrmTimeoutError";
  }
}

export class CrmNetworkError extends Error {
  constructor(message: string) {
    super(`CRM network error: ${message}`);
    this.name = "CrmNetworkError";
  }
}

export class CircuitOpenError extends Error {
  constructor() {
    super("Circuit breaker is open");
    this.name = "CircuitOpenError";
  }
}

/** Network failures, timeouts and 5xx are retried; 4xx application errors are not. */
export function isRetryable(error: unknown): boolean {
  if (error instanceof CrmHttpError) {
    return error.status >= 500;
  }
  return error instanceof CrmTimeoutError || error instanceof CrmNetworkError;
}

export type CrmFailureKind =
  | "unavailable"
  | "timeout"
  | "breaker_open"
  | "not_found"
  | "rejected"
  | "no_seats"
  | "already_booked"
  | "class_passed"
  | "group_full"
  | "unknown";

export interface CrmFailure {
  kind: CrmFailureKind;
  userMessage: string;
  enqueueFallback: boolean;
  /** Internal detail for logs and the fallback queue; never shown to the user. */
  detail: string;
}

export type CrmResult<T> = { ok: true; value: T } | { ok: false; failure: CrmFailure };

const MESSAGES: Record<CrmFailureKind, string> = {
  unavailable: "Технический сбой. Записал заявку — администратор подтвердит.",
  timeout: "Превышено время ожидания. Записал заявку — администратор подтвердит.",
  breaker_open: "Сервис временно недоступен. Записал заявку — администратор подтвердит.",
  not_found: "Расписание изменилось. Показать актуальное расписание?",
  rejected: "Ошибка при обработке запроса. Попробуйте еще раз или обратитесь к администратору.",
  no_seats: "Нет мест на это время. Предлагаю ближайшие доступные варианты.",
  already_booked: "Вы уже записаны на это занятие! Хотите записаться на другое время?",
  class_passed: "Это время уже прошло. Предлагаю ближайшее доступное занятие.",
  group_full: "Группа полная. Хотите встать в лист ожидания или выбрать другое время?",
  unknown: "Произошла ошибка. Записал заявку — администратор подтвердит."
};

const FALLBACK_KINDS: ReadonlySet<CrmFailureKind> = new Set(["unavailable", "timeout", "breaker_open", "unknown"]);

const TEXT_PATTERNS: Array<{ kind: CrmFailureKind; needles: string[] }> = [
  { kind: "group_full", needles: ["группа заполнена", "group full"] },
  { kind: "no_seats", needles: ["нет мест", "no seats", "full"] },
  { kind: "already_booked", needles: ["уже записан", "already booked", "duplicate"] },
  { kind: "not_found", needles: ["занятие не найдено", "not found"] },
  { kind: "class_passed", needles: ["в прошлом", "past", "expired"] }
];

function failure(kind: CrmFailureKind, detail: string): CrmFailure {
  return { kind, userMessage: MESSAGES[kind], enqueueFallback: FALLBACK_KINDS.has(kind), detail };
}

export function classifyCrmError(error: unknown): CrmFailure {
  const detail = error instanceof Error ? error.message : String(error);

  if (error instanceof CrmHttpError) {
    if (error.status >= 500) return failure("unavailable", detail);
    if (error.status === 404) return failure("not_found", detail);
    if (error.status === 400 || error.status === 401 || error.status === 403) return failure("rejected", detail);
  }
  if (error instanceof CrmTimeoutError) return failure("timeout", detail);
  if (error instanceof CircuitOpenError) return failure("breaker_open", detail);
  if (error instanceof CrmNetworkError) return failure("unavailable", detail);

  const text = detail.toLowerCase();
  for (const pattern of TEXT_PATTERNS) {
    if (pattern.needles.some((needle) => text.includes(needle))) {
      return failure(pattern.kind, detail);
    }
  }
  return failure("unknown", detail);
}

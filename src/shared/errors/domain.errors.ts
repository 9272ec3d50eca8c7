// ============================================================================
// src/shared/errors/domain.errors.ts
// ============================================================================

import { MasterMatchError } from '@/shared/errors/base.error';

export class RequestNotFoundError extends MasterMatchError {
  public constructor(requestId: number) {
    super({
      code: 'REQUEST_NOT_FOUND',
      message: `Заявка #${requestId} не найдена.`,
      metadata: { requestId },
      exposeMessage: true,
    });
  }
}

export class OfferNotFoundError extends MasterMatchError {
  public constructor(offerId: number) {
    super({
      code: 'OFFER_NOT_FOUND',
      message: 'Предложение не найдено или уже недоступно.',
      metadata: { offerId },
      exposeMessage: true,
    });
  }
}

export class MasterNotFoundError extends MasterMatchError {
  public constructor(reference: string) {
    super({
      code: 'MASTER_NOT_FOUND',
      message: 'Анкета мастера не найдена.',
      metadata: { reference },
      exposeMessage: true,
    });
  }
}

export class ReviewNotFoundError extends MasterMatchError {
  public constructor(requestId: number) {
    super({
      code: 'REVIEW_NOT_FOUND',
      message: 'Сначала поставьте оценку, затем добавьте отзыв.',
      metadata: { requestId },
      exposeMessage: true,
    });
  }
}

export class UnauthorizedActionError extends MasterMatchError {
  public constructor(action: string) {
    super({
      code: 'UNAUTHORIZED_ACTION',
      message: 'Ошибка авторизации: это действие вам недоступно.',
      metadata: { action },
      exposeMessage: true,
    });
  }
}

export class RequestAlreadyTakenError extends MasterMatchError {
  public constructor(requestId: number) {
    super({
      code: 'REQUEST_ALREADY_TAKEN',
      message: 'Заказ уже взят другим мастером.',
      metadata: { requestId },
      exposeMessage: true,
    });
  }
}

export class QuotaExhaustedError extends MasterMatchError {
  public constructor(masterId: number, freeOrdersStart: number) {
    super({
      code: 'QUOTA_EXHAUSTED',
      message: `У вас закончились ${freeOrdersStart} бесплатных заказа. Оформите подписку, чтобы брать заказы без ограничений.`,
      metadata: { masterId, upsell: 'sub_30d' },
      exposeMessage: true,
    });
  }
}

export class InvalidRequestStateError extends MasterMatchError {
  public constructor(current: unknown, expected: unknown) {
    super({
      code: 'INVALID_REQUEST_STATE',
      message: 'Заявка находится в состоянии, в котором это действие невозможно.',
      metadata: { current, expected },
      exposeMessage: true,
    });
  }
}

export class InvalidRatingError extends MasterMatchError {
  public constructor(rating: number) {
    super({
      code: 'INVALID_RATING',
      message: 'Оценка должна быть от 1 до 5 звёзд.',
      metadata: { rating },
      exposeMessage: true,
    });
  }
}

export class DuplicateMasterProfileError extends MasterMatchError {
  public constructor(userId: string) {
    super({
      code: 'DUPLICATE_MASTER_PROFILE',
      message: 'Анкета мастера для этого аккаунта уже существует.',
      metadata: { userId },
      exposeMessage: true,
    });
  }
}

export class RateLimitExceededError extends MasterMatchError {
  public constructor(action: string, retryAfterMs: number) {
    const minutes = Math.max(1, Math.ceil(retryAfterMs / 60_000));

    super({
      code: 'RATE_LIMIT_EXCEEDED',
      message: `Слишком много действий. Попробуйте снова через ${minutes} мин.`,
      metadata: { action, retryAfterMs },
      exposeMessage: true,
    });
  }
}

export class UnknownPaymentPayloadError extends MasterMatchError {
  public constructor(payload: string) {
    super({
      code: 'UNKNOWN_PAYMENT_PAYLOAD',
      message: 'Неизвестный тип оплаты.',
      metadata: { payload },
      exposeMessage: true,
    });
  }
}

export class DatabaseUnavailableError extends MasterMatchError {
  public constructor(message = 'База данных сейчас недоступна.', cause?: unknown) {
    super({
      code: 'DATABASE_UNAVAILABLE',
      message,
      exposeMessage: false,
      cause,
    });
  }
}

export class ValidationFailedError extends MasterMatchError {
  public constructor(details: Record<string, unknown>) {
    super({
      code: 'VALIDATION_FAILED',
      message: 'Переданные данные некорректны.',
      metadata: details,
      exposeMessage: true,
    });
  }
}

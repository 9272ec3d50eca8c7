import { MessageFlags, type ModalSubmitInteraction } from 'discord.js';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { FileComplaintUseCase } from '@/application/usecases/complaints/FileComplaintUseCase';
import { SubmitReviewCommentUseCase } from '@/application/usecases/reviews/SubmitReviewCommentUseCase';
import { ComplaintRole } from '@/domain/value-objects/ComplaintRole';
import { RequestStatus } from '@/domain/value-objects/RequestStatus';
import { InMemoryRateLimiter } from '@/infrastructure/rate-limit/InMemoryRateLimiter';
import { buildRatingRow } from '@/presentation/components/buttons/ReviewButtons';
import { ComplaintModal, registerComplaintModal } from '@/presentation/components/modals/ComplaintModal';
import { MasterRegistrationModal } from '@/presentation/components/modals/MasterRegistrationModal';
import {
  registerReviewCommentModal,
  ReviewCommentModal,
} from '@/presentation/components/modals/ReviewCommentModal';
import { ServiceRequestModal } from '@/presentation/components/modals/ServiceRequestModal';
import { modalHandlers, resolveComponentHandler } from '@/presentation/components/registry';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';

import { CLIENT_ID, masterProps, NOW, requestProps } from '../../../support/fixtures';
import { createInMemoryMarketplace } from '../../../support/InMemoryMarketplace';
import { silentLogger } from '../../../support/logger';
import { RecordingNotifier } from '../../../support/RecordingNotifier';

const fieldsOf = (values: Record<string, string>) => ({
  fields: { getTextInputValue: (id: string) => values[id] ?? '' },
});

describe('ServiceRequestModal', () => {
  it('carries the category in its custom id', () => {
    const modal = ServiceRequestModal.build('uborka');

    expect(modal.toJSON().custom_id).toBe('request-form:v1:uborka');
    expect(ServiceRequestModal.parseCategory('request-form:v1:uborka')).toBe('uborka');
    expect(ServiceRequestModal.parseCategory('request-form:v1:cooking')).toBeNull();
  });

  it('reads the submitted form into a request payload', () => {
    const dto = ServiceRequestModal.parseFields(
      fieldsOf({
        name: 'Анна',
        contact: '+79990000000',
        address: 'ул. Ленина, 1',
        description: 'Помыть окна',
        time: 'в субботу',
      }),
      '111111111111111111',
      'uborka',
    );

    expect(dto).toEqual({
      clientUserId: '111111111111111111',
      category: 'uborka',
      clientName: 'Анна',
      contact: '+79990000000',
      address: 'ул. Ленина, 1',
      description: 'Помыть окна',
      desiredTime: 'в субботу',
    });
  });
});

describe('MasterRegistrationModal', () => {
  it('round-trips the slash command choices', () => {
    const modal = MasterRegistrationModal.build({
      categories: ['remont', 'pereezd'],
      experienceBucket: '>10',
      taxId: null,
    });
    const customId = modal.toJSON().custom_id;

    expect(customId).toBe('master-form:v1:remont+pereezd:>10:-');
    expect(MasterRegistrationModal.parseChoices(customId)).toEqual({
      categories: ['remont', 'pereezd'],
      experienceBucket: '>10',
      taxId: null,
    });
  });

  it('rejects ids without a known category or with an unknown bucket', () => {
    expect(MasterRegistrationModal.parseChoices('master-form:v1:cooking:-:-')).toBeNull();
    expect(MasterRegistrationModal.parseChoices('master-form:v1:remont:forever:-')).toBeNull();
  });

  it('combines the form fields with the stored choices', () => {
    const dto = MasterRegistrationModal.parseFields(
      fieldsOf({ full_name: 'Иван Петров', phone: '89991234567', experience: 'Сантехник' }),
      '222222222222222222',
      { categories: ['remont'], experienceBucket: null, taxId: '123456789012' },
    );

    expect(dto).toEqual({
      userId: '222222222222222222',
      categories: ['remont'],
      experienceBucket: undefined,
      taxId: '123456789012',
      fullName: 'Иван Петров',
      phone: '89991234567',
      experienceText: 'Сантехник',
      portfolio: '',
      references: '',
    });
  });
});

describe('ReviewCommentModal', () => {
  it('encodes the request id and trims the comment', () => {
    expect(ReviewCommentModal.build(10).toJSON().custom_id).toBe('review-comment:v1:a');
    expect(ReviewCommentModal.parseRequestId('review-comment:v1:a')).toBe(10);
    expect(ReviewCommentModal.parseFields(fieldsOf({ comment: '  Отлично!  ' }))).toBe('Отлично!');
  });
});

describe('review comment submission', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
    modalHandlers.clear();
  });

  const submitComment = async (comment: string) => {
    const marketplace = createInMemoryMarketplace(() => NOW);
    marketplace.store.insertMaster(masterProps({ id: 1 }));
    marketplace.store.insertRequest(
      requestProps({ id: 10, status: RequestStatus.COMPLETED, masterId: 1, reviewRequested: true }),
    );
    registerReviewCommentModal(
      new SubmitReviewCommentUseCase(marketplace.requestRepo, marketplace.reviewRepo, silentLogger),
    );

    const reply = vi.fn(async (_options: unknown) => undefined);
    const interaction = {
      customId: 'review-comment:v1:a',
      user: { id: CLIENT_ID },
      fields: { getTextInputValue: (_id: string) => comment },
      deferred: false,
      replied: false,
      reply,
      followUp: vi.fn(async () => undefined),
    } as unknown as ModalSubmitInteraction;

    const handler = resolveComponentHandler(modalHandlers, interaction.customId);
    expect(handler).toBeDefined();
    await handler?.(interaction);

    return { reply, marketplace };
  };

  it('asks for a rating when the comment comes first', async () => {
    const { reply, marketplace } = await submitComment('Всё отлично');

    expect(reply).toHaveBeenCalledWith({
      embeds: [
        embedFactory.info({
          title: 'Сначала оценка',
          description: 'Поставьте оценку от 1 до 5, затем снова нажмите «Написать отзыв».',
        }),
      ],
      components: [buildRatingRow(10)],
    });
    await expect(marketplace.reviewRepo.findByRequestId(10)).resolves.toBeNull();
  });
});

describe('ComplaintModal', () => {
  it('carries the reporter role in its custom id', () => {
    expect(ComplaintModal.build(ComplaintRole.MASTER).toJSON().custom_id).toBe('complaint-form:v1:master');
    expect(ComplaintModal.parseRole('complaint-form:v1:master')).toBe(ComplaintRole.MASTER);
    expect(ComplaintModal.parseRole('complaint-form:v1:master:extra')).toBeNull();
  });

  it('reads the optional references and the text', () => {
    const dto = ComplaintModal.parseFields(
      fieldsOf({ order_id: '#12', master_id: '', text: 'Мастер не пришёл' }),
      CLIENT_ID,
      ComplaintRole.CLIENT,
    );

    expect(dto).toEqual({
      reporterUserId: CLIENT_ID,
      role: ComplaintRole.CLIENT,
      requestId: '#12',
      masterId: '',
      text: 'Мастер не пришёл',
    });
  });
});

describe('complaint submission', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
    modalHandlers.clear();
  });

  it('files the complaint and confirms it to the reporter', async () => {
    const marketplace = createInMemoryMarketplace(() => NOW);
    const notifier = new RecordingNotifier();
    registerComplaintModal(
      new FileComplaintUseCase(
        marketplace.complaintRepo,
        new InMemoryRateLimiter(() => NOW.getTime()),
        notifier,
        silentLogger,
      ),
    );

    const values: Record<string, string> = { order_id: '12', master_id: '', text: 'Мастер не пришёл' };
    const reply = vi.fn(async (_options: unknown) => undefined);
    const interaction = {
      customId: 'complaint-form:v1:client',
      user: { id: CLIENT_ID },
      fields: { getTextInputValue: (id: string) => values[id] ?? '' },
      deferred: false,
      replied: false,
      reply,
      followUp: vi.fn(async () => undefined),
    } as unknown as ModalSubmitInteraction;

    await resolveComponentHandler(modalHandlers, interaction.customId)?.(interaction);

    expect(reply).toHaveBeenCalledWith({
      embeds: [
        embedFactory.success({
          title: 'Жалоба #1 принята',
          description: 'Администраторы рассмотрят её и свяжутся с вами при необходимости.',
        }),
      ],
      flags: MessageFlags.Ephemeral,
    });
    expect(notifier.adminNotices.map((notice) => notice.kind)).toEqual(['complaint_filed']);
  });
});

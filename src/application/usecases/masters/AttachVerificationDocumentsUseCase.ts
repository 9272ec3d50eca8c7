// ============================================================================
// src/application/usecases/masters/AttachVerificationDocumentsUseCase.ts
// ============================================================================

import type { Logger } from 'pino';

import { type AttachDocumentsDTO, AttachDocumentsSchema } from '@/application/dto/master.dto';
import type { VerificationDocuments } from '@/domain/entities/Master';
import type { IMasterRepository } from '@/domain/repositories/IMasterRepository';
import { MasterNotFoundError } from '@/shared/errors/domain.errors';

export class AttachVerificationDocumentsUseCase {
  public constructor(
    private readonly masterRepo: IMasterRepository,
    private readonly logger: Logger,
  ) {}

  public async execute(dto: AttachDocumentsDTO): Promise<void> {
    const payload = AttachDocumentsSchema.parse(dto);

    const master = await this.masterRepo.findByUserId(payload.userId);
    if (!master) {
      throw new MasterNotFoundError(payload.userId);
    }

    const documents: Partial<VerificationDocuments> = {
      ...(payload.passportScan ? { passportScan: payload.passportScan } : {}),
      ...(payload.facePhoto ? { facePhoto: payload.facePhoto } : {}),
      ...(payload.selfEmploymentDoc ? { selfEmploymentDoc: payload.selfEmploymentDoc } : {}),
    };

    await this.masterRepo.attachDocuments(master.id, documents);

    this.logger.info(
      { masterId: master.id, documents: Object.keys(documents) },
      'Документы для верификации приложены.',
    );
  }
}

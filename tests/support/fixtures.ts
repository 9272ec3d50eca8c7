import { EMPTY_DOCUMENTS, Master, type MasterProps } from '@/domain/entities/Master';
import { ServiceRequest, type ServiceRequestProps } from '@/domain/entities/ServiceRequest';
import { MasterLevel } from '@/domain/value-objects/MasterLevel';
import { RequestStatus } from '@/domain/value-objects/RequestStatus';
import { SkillTier } from '@/domain/value-objects/SkillTier';

export const CLIENT_ID = '111111111111111111';
export const MASTER_USER_ID = '222222222222222222';
export const OTHER_MASTER_USER_ID = '333333333333333333';
export const STRANGER_ID = '444444444444444444';

export const NOW = new Date('2024-05-10T12:00:00.000Z');

export const masterProps = (overrides: Partial<MasterProps> = {}): MasterProps => ({
  id: 1,
  userId: MASTER_USER_ID,
  fullName: 'Иван Петров',
  phone: '+79991234567',
  level: MasterLevel.CANDIDATE,
  categories: ['🛠 Ремонт'],
  experienceBucket: '1-3',
  experienceText: null,
  portfolio: null,
  references: null,
  taxId: null,
  freeOrdersLeft: 3,
  subUntil: null,
  priorityUntil: null,
  pinUntil: null,
  isActive: true,
  ordersCompleted: 0,
  skillTier: SkillTier.NOVICE,
  avgRating: 0,
  reviewsCount: 0,
  documents: EMPTY_DOCUMENTS,
  createdAt: new Date('2024-05-01T00:00:00.000Z'),
  ...overrides,
});

export const buildMaster = (overrides: Partial<MasterProps> = {}): Master => new Master(masterProps(overrides));

export const requestProps = (overrides: Partial<ServiceRequestProps> = {}): ServiceRequestProps => ({
  id: 1,
  clientUserId: CLIENT_ID,
  clientName: 'Анна',
  contact: '+79990000000',
  category: '🛠 Ремонт',
  address: 'ул. Ленина, 1',
  description: 'Починить кран',
  desiredTime: 'завтра вечером',
  status: RequestStatus.NEW,
  masterId: null,
  reviewRequested: false,
  createdAt: new Date('2024-05-10T10:00:00.000Z'),
  pendingSince: null,
  completedAt: null,
  ...overrides,
});

export const buildRequest = (overrides: Partial<ServiceRequestProps> = {}): ServiceRequest =>
  new ServiceRequest(requestProps(overrides));

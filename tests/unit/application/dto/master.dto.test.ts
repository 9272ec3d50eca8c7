import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { AttachDocumentsSchema, normalizePhone, RegisterMasterSchema } from '@/application/dto/master.dto';
import { CreateServiceRequestSchema } from '@/application/dto/request.dto';

import { CLIENT_ID, MASTER_USER_ID } from '../../../support/fixtures';

describe('normalizePhone', () => {
  it.each([
    ['+7 (999) 123-45-67', '+79991234567'],
    ['89991234567', '+79991234567'],
    ['79991234567', '+79991234567'],
    ['999 123 45 67', '+79991234567'],
  ])('normalizes %s', (raw, expected) => {
    expect(normalizePhone(raw)).toBe(expected);
  });

  it.each(['12345', '+1 999 123 45 67', '59991234567', '8999123456'])('rejects %s', (raw) => {
    expect(normalizePhone(raw)).toBeNull();
  });
});

describe('RegisterMasterSchema', () => {
  const base = {
    userId: MASTER_USER_ID,
    fullName: '  Иван Петров ',
    phone: '8 999 123 45 67',
    categories: ['remont'],
  };

  it('normalizes the profile and turns blank optionals into null', () => {
    const parsed = RegisterMasterSchema.parse({ ...base, experienceText: '   ', taxId: '' });

    expect(parsed).toEqual({
      userId: MASTER_USER_ID,
      fullName: 'Иван Петров',
      phone: '+79991234567',
      categories: ['remont'],
      experienceBucket: null,
      experienceText: null,
      portfolio: null,
      references: null,
      taxId: null,
    });
  });

  it('accepts two distinct categories and a 12-digit tax id', () => {
    const parsed = RegisterMasterSchema.parse({
      ...base,
      categories: ['remont', 'uborka'],
      experienceBucket: '3-5',
      taxId: '123456789012',
    });

    expect(parsed.categories).toEqual(['remont', 'uborka']);
    expect(parsed.experienceBucket).toBe('3-5');
    expect(parsed.taxId).toBe('123456789012');
  });

  it.each([
    ['no categories', { categories: [] }],
    ['three categories', { categories: ['remont', 'uborka', 'pereezd'] }],
    ['duplicate categories', { categories: ['remont', 'remont'] }],
    ['unknown category', { categories: ['gardening'] }],
    ['bad phone', { phone: '12345' }],
    ['short tax id', { taxId: '12345' }],
    ['unknown experience', { experienceBucket: '20+' }],
  ])('rejects %s', (_label, override) => {
    expect(() => RegisterMasterSchema.parse({ ...base, ...override })).toThrow(ZodError);
  });
});

describe('AttachDocumentsSchema', () => {
  it('requires at least one document', () => {
    expect(() => AttachDocumentsSchema.parse({ userId: MASTER_USER_ID })).toThrow(ZodError);
  });

  it('requires documents to be URLs', () => {
    expect(() => AttachDocumentsSchema.parse({ userId: MASTER_USER_ID, passportScan: 'passport.jpg' })).toThrow(
      ZodError,
    );
  });
});

describe('CreateServiceRequestSchema', () => {
  it('trims every text field', () => {
    const parsed = CreateServiceRequestSchema.parse({
      clientUserId: CLIENT_ID,
      clientName: ' Анна ',
      contact: ' @anna ',
      category: 'remont',
      address: ' ул. Ленина, 1 ',
      description: ' Починить кран ',
      desiredTime: ' завтра ',
    });

    expect(parsed).toEqual({
      clientUserId: CLIENT_ID,
      clientName: 'Анна',
      contact: '@anna',
      category: 'remont',
      address: 'ул. Ленина, 1',
      description: 'Починить кран',
      desiredTime: 'завтра',
    });
  });

  it('rejects an address shorter than five characters', () => {
    expect(() =>
      CreateServiceRequestSchema.parse({
        clientUserId: CLIENT_ID,
        clientName: 'Анна',
        contact: '@anna',
        category: 'remont',
        address: 'дом',
        description: 'Починить кран',
        desiredTime: 'завтра',
      }),
    ).toThrow(ZodError);
  });
});

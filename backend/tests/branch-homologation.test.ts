import { deriveBranchHomologations } from '../src/services/branch-homologation.js';
import type { BranchHomologation, RejectionRecord } from '../src/types/rejections.js';
import { VALID_UNTIL } from '../src/services/homologation-common.js';
import { CollectingLog } from './support/collecting-log.js';
import { MemoryRejectionStore } from './support/memory-store.js';

const now = new Date('2026-03-01T12:00:00Z');
const weekStart = new Date('2024-04-08T00:00:00Z');

const branchRejection: Partial<RejectionRecord> = {
  rejectionId: 301,
  caseOwner: 'Gobierno de Datos',
  module: 'Sellout',
  rejectedField: 'SUCID',
  rejectionReason: 'Sucursal no encontrada en tabla de homologación',
  case: 'Homologacion Sucursal',
  rejectedValue: '0042',
  homologatedValue: 'S-100',
  countryId: 1,
  weekCode: 202415,
};

function storeWith(overrides: Partial<RejectionRecord> = {}, branchHomologations: BranchHomologation[] = []) {
  return new MemoryRejectionStore({
    rejections: [{ ...branchRejection, ...overrides }],
    branches: { 'S-100': { groupId: 10, chainId: 5, name: 'Sucursal Centro', street: '' } },
    weeks: [{ year: 2024, week: 15, start: weekStart }],
    branchHomologations,
  });
}

describe('deriveBranchHomologations', () => {
  it('inserts a branch homologation with the resolved branch metadata', async () => {
    const store = storeWith();
    const summary = await deriveBranchHomologations([301], { store, now: () => now });

    expect(summary.inserted).toBe(1);
    expect(summary.insertedDetails).toEqual([
      { rejectionId: 301, countryId: 1, branchNumber: '0042', groupId: 10, branchId: 'S-100' },
    ]);
    expect(store.branchHomologations).toEqual([
      {
        countryId: 1,
        branchNumber: '0042',
        groupId: 10,
        chainId: 5,
        description: 'Sucursal Centro',
        address: null,
        branchId: 'S-100',
        active: true,
        createdAt: now,
        updatedAt: now,
        validFrom: weekStart,
        validUntil: VALID_UNTIL,
      },
    ]);
  });

  it('fails the record when the branch id has no metadata', async () => {
    const store = storeWith({ homologatedValue: 'S-404' });
    const summary = await deriveBranchHomologations([301], { store, now: () => now });

    expect(summary).toEqual({
      total: 1,
      inserted: 0,
      duplicated: 0,
      failed: 1,
      errors: ["Rejection 301: no branch metadata found for SUCID='S-404'"],
      duplicates: [],
      insertedDetails: [],
    });
    expect(store.branchHomologations).toEqual([]);
  });

  it('skips branches that are already homologated for the group', async () => {
    const store = storeWith({}, [
      {
        countryId: 1,
        branchNumber: '0042',
        groupId: 10,
        chainId: null,
        description: null,
        address: null,
        branchId: 'S-100',
        active: true,
        createdAt: now,
        updatedAt: now,
        validFrom: null,
        validUntil: VALID_UNTIL,
      },
    ]);
    const summary = await deriveBranchHomologations([301], { store, now: () => now });

    expect(summary.duplicated).toBe(1);
    expect(summary.inserted).toBe(0);
    expect(summary.duplicates).toEqual([
      { rejectionId: 301, countryId: 1, branchNumber: '0042', groupId: 10, branchId: 'S-100' },
    ]);
  });

  it('ignores rejections outside the branch case or without a value', async () => {
    const otherCase = await deriveBranchHomologations([301], { store: storeWith({ case: 'Homologacion Producto' }) });
    const noValue = await deriveBranchHomologations([301], { store: storeWith({ homologatedValue: null }) });

    expect(otherCase.total).toBe(0);
    expect(noValue.total).toBe(0);
  });

  it('records a general error when the selection query fails', async () => {
    const store = storeWith();
    store.failOn('findRejections', new Error('permission denied'));
    const summary = await deriveBranchHomologations([301], { store });

    expect(summary.total).toBe(0);
    expect(summary.errors).toEqual(['General error: permission denied']);
  });

  it('inserts with an empty valid-from when the week calendar cannot be read', async () => {
    const store = storeWith();
    store.failOn('findWeekStart', new Error('catsemanas missing'));
    const log = new CollectingLog();
    const summary = await deriveBranchHomologations([301], { store, log, now: () => now });

    expect(summary.inserted).toBe(1);
    expect(summary.failed).toBe(0);
    expect(summary.errors).toEqual([]);
    expect(store.branchHomologations[0].validFrom).toBeNull();
    expect(log.messages('warn')).toEqual([
      'Week 202415: start date unavailable, valid-from left empty: catsemanas missing',
    ]);
  });
});

import { describe, it, expect } from 'vitest';
import { ErrorCodes, REQUEST_KINDS } from '@batchguard/types';
import { VALUE_VERIFIER_KINDS } from '../../src/definitions/kinds.js';
import { runValueVerifier } from '../../src/verify/dispatch.js';
import {
  parseLeadingInteger,
  verifyCheckpoint,
  verifyCredentialName,
  verifyHold,
  verifyJoinPath,
  verifyKeepFiles,
  verifyLicenseLinger,
  verifyMailPoints,
  verifyMaxLicenses,
  verifyMinLicenses,
  verifyNonZeroPositive,
  verifyPriority,
  verifyQueueType,
  verifySandbox,
  verifyState,
  verifyZeroOrPositive,
} from '../../src/verify/scalar.js';
import { verifyJobName } from '../../src/verify/lists.js';
import { attr, createTestContext } from './helpers.js';

const badValue = { status: 'rejected', code: ErrorCodes.badAttributeValue };
const ok = { status: 'accepted' };

describe('empty values', () => {
  const verifiers = VALUE_VERIFIER_KINDS.filter((kind) => kind !== 'resource');

  it('are rejected by every verifier on a submit request', async () => {
    const context = await createTestContext({ request: 'queueJob' });

    for (const kind of verifiers) {
      expect(runValueVerifier(context, kind, attr('x', '')).status, kind).toBe('rejected');
      expect(runValueVerifier(context, kind, attr('x', undefined)).status, kind).toBe('rejected');
    }
  });

  it('are accepted for job names only by status and select requests', async () => {
    for (const request of REQUEST_KINDS) {
      const context = await createTestContext({ request });
      const expected = request === 'statusJob' || request === 'selectJobs' ? 'accepted' : 'rejected';
      expect(verifyJobName(context, attr('Job_Name', '')).status, request).toBe(expected);
      expect(verifyJobName(context, attr('Job_Name', undefined)).status, request).toBe('rejected');
    }
  });

  it('are accepted for job state only by status requests', async () => {
    for (const request of REQUEST_KINDS) {
      const context = await createTestContext({ request });
      const expected = request === 'statusJob' ? 'accepted' : 'rejected';
      expect(verifyState(context, attr('job_state', '')).status, request).toBe(expected);
      expect(verifyState(context, attr('job_state', undefined)).status, request).toBe('rejected');
    }
  });
});

describe('verifyPriority', () => {
  it('accepts the bounds', async () => {
    const context = await createTestContext();
    expect(verifyPriority(context, attr('Priority', '-1024'))).toEqual(ok);
    expect(verifyPriority(context, attr('Priority', '1023'))).toEqual(ok);
  });

  it('rejects values outside the bounds for submit requests', async () => {
    const context = await createTestContext({ request: 'queueJob' });
    expect(verifyPriority(context, attr('Priority', '1024'))).toEqual(badValue);
    expect(verifyPriority(context, attr('Priority', '-1025'))).toEqual(badValue);
  });

  it('accepts any value for select requests', async () => {
    const context = await createTestContext({ request: 'selectJobs' });
    expect(verifyPriority(context, attr('Priority', '1024'))).toEqual(ok);
  });

  it('reads non-numeric text as zero', async () => {
    const context = await createTestContext();
    expect(parseLeadingInteger('abc')).toBe(0);
    expect(parseLeadingInteger('12abc')).toBe(12);
    expect(verifyPriority(context, attr('Priority', 'abc'))).toEqual(ok);
  });
});

describe('integer bounds', () => {
  it('checks zero-or-positive and positive values', async () => {
    const context = await createTestContext();
    expect(verifyZeroOrPositive(context, attr('run_count', '0'))).toEqual(ok);
    expect(verifyZeroOrPositive(context, attr('run_count', '-1'))).toEqual(badValue);
    expect(verifyNonZeroPositive(context, attr('reserve_count', '1'))).toEqual(ok);
    expect(verifyNonZeroPositive(context, attr('reserve_count', '0'))).toEqual(badValue);
  });

  it('bounds license counts by the configured maximum', async () => {
    const context = await createTestContext({ object: 'server', request: 'manager', config: { maxLicenses: 100 } });
    const minBad = { status: 'rejected', code: ErrorCodes.licenseMinBadValue };
    const maxBad = { status: 'rejected', code: ErrorCodes.licenseMaxBadValue };

    expect(verifyMinLicenses(context, attr('pbs_license_min', '100'))).toEqual(ok);
    expect(verifyMinLicenses(context, attr('pbs_license_min', '101'))).toEqual(minBad);
    expect(verifyMinLicenses(context, attr('pbs_license_min', '-1'))).toEqual(minBad);
    expect(verifyMaxLicenses(context, attr('pbs_license_max', '0'))).toEqual(ok);
    expect(verifyMaxLicenses(context, attr('pbs_license_max', '101'))).toEqual(maxBad);
  });

  it('requires a positive linger time', async () => {
    const context = await createTestContext({ object: 'server', request: 'manager' });
    expect(verifyLicenseLinger(context, attr('pbs_license_linger_time', '10'))).toEqual(ok);
    expect(verifyLicenseLinger(context, attr('pbs_license_linger_time', '0'))).toEqual({
      status: 'rejected',
      code: ErrorCodes.licenseLingerBadValue,
    });
  });
});

describe('verifyHold', () => {
  it('enforces the exclusive flags', async () => {
    const context = await createTestContext();
    expect(verifyHold(context, attr('Hold_Types', 'n'))).toEqual(ok);
    expect(verifyHold(context, attr('Hold_Types', 'no'))).toEqual(badValue);
    expect(verifyHold(context, attr('Hold_Types', 'uo'))).toEqual(ok);
    expect(verifyHold(context, attr('Hold_Types', 'uos'))).toEqual(ok);
    expect(verifyHold(context, attr('Hold_Types', 'up'))).toEqual(badValue);
    expect(verifyHold(context, attr('Hold_Types', 'p'))).toEqual(ok);
    expect(verifyHold(context, attr('Hold_Types', 'pn'))).toEqual(badValue);
    expect(verifyHold(context, attr('Hold_Types', 'x'))).toEqual(badValue);
  });
});

describe('verifyCheckpoint', () => {
  it('accepts single flags and intervals', async () => {
    const context = await createTestContext();
    expect(verifyCheckpoint(context, attr('Checkpoint', 's'))).toEqual(ok);
    expect(verifyCheckpoint(context, attr('Checkpoint', 'c=120'))).toEqual(ok);
    expect(verifyCheckpoint(context, attr('Checkpoint', 'w=5'))).toEqual(ok);
  });

  it('rejects malformed values', async () => {
    const context = await createTestContext();
    expect(verifyCheckpoint(context, attr('Checkpoint', 'c='))).toEqual(badValue);
    expect(verifyCheckpoint(context, attr('Checkpoint', 'x'))).toEqual(badValue);
    expect(verifyCheckpoint(context, attr('Checkpoint', 'c=1m'))).toEqual(badValue);
  });

  it('only lets queries compare u for equality', async () => {
    const context = await createTestContext({ request: 'selectJobs' });
    expect(verifyCheckpoint(context, attr('Checkpoint', 'u', { operator: 'eq' }))).toEqual(ok);
    expect(verifyCheckpoint(context, attr('Checkpoint', 'u', { operator: 'ne' }))).toEqual(ok);
    expect(verifyCheckpoint(context, attr('Checkpoint', 'u', { operator: 'gt' }))).toEqual(badValue);
  });
});

describe('verifyMailPoints', () => {
  it('drops leading whitespace', async () => {
    const context = await createTestContext();
    expect(verifyMailPoints(context, attr('Mail_Points', '  abe'))).toEqual({ status: 'accepted', value: 'abe' });
    expect(verifyMailPoints(context, attr('Mail_Points', 'abe'))).toEqual(ok);
    expect(verifyMailPoints(context, attr('Mail_Points', '   '))).toEqual(badValue);
  });

  it('allows c only for reservations', async () => {
    const job = await createTestContext({ request: 'queueJob' });
    const resv = await createTestContext({ request: 'submitResv', object: 'reservation' });
    expect(verifyMailPoints(job, attr('Mail_Points', 'c'))).toEqual(badValue);
    expect(verifyMailPoints(resv, attr('Mail_Points', 'bc'))).toEqual(ok);
    expect(verifyMailPoints(job, attr('Mail_Points', 'n'))).toEqual(ok);
  });
});

describe('enumerations', () => {
  it('match join path and keep files exactly', async () => {
    const context = await createTestContext();
    expect(verifyJoinPath(context, attr('Join_Path', 'oe'))).toEqual(ok);
    expect(verifyJoinPath(context, attr('Join_Path', 'o'))).toEqual(badValue);
    expect(verifyKeepFiles(context, attr('Keep_Files', 'o'))).toEqual(ok);
    expect(verifyKeepFiles(context, attr('Keep_Files', 'OE'))).toEqual(badValue);
  });

  it('match sandbox values case-insensitively', async () => {
    const context = await createTestContext();
    expect(verifySandbox(context, attr('sandbox', 'private'))).toEqual(ok);
    expect(verifySandbox(context, attr('sandbox', 'SCRATCH'))).toEqual(badValue);
  });

  it('match credential names exactly', async () => {
    const context = await createTestContext();
    expect(verifyCredentialName(context, attr('cred', 'KRB5'))).toEqual(ok);
    expect(verifyCredentialName(context, attr('cred', 'krb5'))).toEqual(badValue);
  });

  it('match queue types by prefix', async () => {
    const context = await createTestContext({ object: 'queue', request: 'manager' });
    expect(verifyQueueType(context, attr('queue_type', 'e'))).toEqual(ok);
    expect(verifyQueueType(context, attr('queue_type', 'Exec'))).toEqual(ok);
    expect(verifyQueueType(context, attr('queue_type', 'ROUTE'))).toEqual(ok);
    expect(verifyQueueType(context, attr('queue_type', 'batch'))).toEqual(badValue);
  });
});

describe('verifyState', () => {
  it('accepts job state letters only', async () => {
    const context = await createTestContext({ request: 'selectJobs' });
    expect(verifyState(context, attr('job_state', 'QR'))).toEqual(ok);
    expect(verifyState(context, attr('job_state', 'QZ'))).toEqual(badValue);
    expect(verifyState(context, attr('job_state', 'q'))).toEqual(badValue);
  });
});

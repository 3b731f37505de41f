import { describe, it, expect } from 'vitest';
import { ErrorCodes } from '@batchguard/types';
import {
  verifyArrayRange,
  verifyDependList,
  verifyJobName,
  verifyMailUsers,
  verifyPath,
  verifyQueueName,
  verifyShellPathList,
  verifyStageList,
  verifyUserList,
} from '../../src/verify/lists.js';
import { attr, createTestContext } from './helpers.js';

describe('verifyUserList', () => {
  it('requires unique hosts except for queries', async () => {
    const submit = await createTestContext({ request: 'queueJob' });
    const select = await createTestContext({ request: 'selectJobs' });
    const value = attr('User_List', 'alice@node1,bob@node1');

    expect(verifyUserList(submit, value).status).toBe('rejected');
    expect(verifyUserList(select, value).status).toBe('accepted');
  });
});

describe('other lists', () => {
  it('accepts repeated hosts in mail user lists', async () => {
    const context = await createTestContext();
    expect(verifyMailUsers(context, attr('Mail_Users', 'alice@node1,bob@node1')).status).toBe('accepted');
  });

  it('requires absolute shells', async () => {
    const context = await createTestContext();
    expect(verifyShellPathList(context, attr('Shell_Path_List', '/bin/sh@node1,/bin/bash')).status).toBe('accepted');
    expect(verifyShellPathList(context, attr('Shell_Path_List', 'bash')).status).toBe('rejected');
  });

  it('checks staging lists', async () => {
    const context = await createTestContext();
    expect(verifyStageList(context, attr('stagein', 'in.dat@node1:/data/in.dat')).status).toBe('accepted');
    expect(verifyStageList(context, attr('stagein', 'in.dat')).status).toBe('rejected');
  });
});

describe('rewriting verifiers', () => {
  it('expand dependency lists and accept their own output', async () => {
    const context = await createTestContext({ config: { defaultServer: 'svr1' } });

    const first = verifyDependList(context, attr('depend', 'afterok:42'));
    expect(first).toEqual({ status: 'accepted', value: 'afterok:42.svr1' });

    const second = verifyDependList(context, attr('depend', 'afterok:42.svr1'));
    expect(second).toEqual({ status: 'accepted', value: 'afterok:42.svr1' });
  });

  it('normalise paths and accept their own output', async () => {
    const context = await createTestContext({ config: { submitHost: 'submit1', workingDirectory: '/home/user' } });

    const first = verifyPath(context, attr('Output_Path', 'out.log'));
    expect(first).toEqual({ status: 'accepted', value: 'submit1:/home/user/out.log' });

    const second = verifyPath(context, attr('Output_Path', 'submit1:/home/user/out.log'));
    expect(second).toEqual(first);
  });

  it('reject what they cannot parse', async () => {
    const context = await createTestContext();
    expect(verifyDependList(context, attr('depend', 'whenever:1'))).toEqual({
      status: 'rejected',
      code: ErrorCodes.badAttributeValue,
    });
    expect(verifyPath(context, attr('Output_Path', '/tmp/a b'))).toEqual({
      status: 'rejected',
      code: ErrorCodes.badAttributeValue,
    });
  });
});

describe('verifyArrayRange', () => {
  it('maps range checks to codes', async () => {
    const context = await createTestContext();
    expect(verifyArrayRange(context, attr('array_indices_submitted', '1-10'))).toEqual({ status: 'accepted' });
    expect(verifyArrayRange(context, attr('array_indices_submitted', '10-1'))).toEqual({
      status: 'rejected',
      code: ErrorCodes.valueOutOfRange,
    });
    expect(verifyArrayRange(context, attr('array_indices_submitted', 'x'))).toEqual({
      status: 'rejected',
      code: ErrorCodes.badAttributeValue,
    });
  });
});

describe('verifyJobName', () => {
  it('allows numeric leads for submit, modify and select requests', async () => {
    for (const request of ['queueJob', 'modifyJob', 'submitResv', 'selectJobs'] as const) {
      const context = await createTestContext({ request });
      expect(verifyJobName(context, attr('Job_Name', '1job')).status, request).toBe('accepted');
    }

    const status = await createTestContext({ request: 'statusJob' });
    expect(verifyJobName(status, attr('Job_Name', '1job')).status).toBe('rejected');
  });

  it('reports long names with their own code', async () => {
    const context = await createTestContext();
    expect(verifyJobName(context, attr('Job_Name', 'j'.repeat(237)))).toEqual({
      status: 'rejected',
      code: ErrorCodes.jobNameTooLong,
    });
  });
});

describe('verifyQueueName', () => {
  it('checks queue names', async () => {
    const context = await createTestContext();
    expect(verifyQueueName(context, attr('queue', 'workq')).status).toBe('accepted');
    expect(verifyQueueName(context, attr('queue', 'work q')).status).toBe('rejected');
  });
});

import { describe, it, expect, vi } from 'vitest';
import { ErrorCodes, toStatusCode } from '@batchguard/types';
import { verifyAttribute, verifyAttributes } from '../../src/verify/registry.js';
import { attr, createTestContext, FakeHostResolver } from './helpers.js';

describe('verifyAttribute', () => {
  it('accepts attributes the object does not define', async () => {
    const debug = vi.fn();
    const context = await createTestContext({ logger: { debug, warn: vi.fn() } });

    await expect(verifyAttribute(context, attr('site_flag', 'x'))).resolves.toEqual({ status: 'accepted' });
    expect(debug).toHaveBeenCalledWith('job attribute site_flag is not defined, accepted unchecked');
  });

  it('names the attribute in rejection messages', async () => {
    const context = await createTestContext();
    const result = await verifyAttribute(context, attr('Hold_Types', 'no'));

    expect(result).toEqual({
      status: 'rejected',
      code: ErrorCodes.badAttributeValue,
      message: 'Illegal attribute or resource value Hold_Types',
    });
    expect(toStatusCode(result)).toBe(15014);
  });

  it('runs the datatype check before the verifier', async () => {
    const context = await createTestContext({ request: 'selectJobs' });
    await expect(verifyAttribute(context, attr('Priority', 'high'))).resolves.toEqual({
      status: 'rejected',
      code: ErrorCodes.badAttributeValue,
      message: 'Illegal attribute or resource value Priority',
    });
  });

  it('verifies resources of resource-valued attributes', async () => {
    const context = await createTestContext();
    await expect(
      verifyAttribute(context, attr('Resource_List', '1:ncpus=-1', { resource: 'select' }))
    ).resolves.toEqual({
      status: 'rejected',
      code: ErrorCodes.badAttributeValue,
      message: 'Illegal attribute or resource value Resource_List.ncpus',
    });
  });

  it('uses range specific codes', async () => {
    const context = await createTestContext();
    await expect(verifyAttribute(context, attr('Job_Name', 'j'.repeat(237)))).resolves.toEqual({
      status: 'rejected',
      code: ErrorCodes.jobNameTooLong,
      message: 'Job name is too long Job_Name',
    });

    const server = await createTestContext({ object: 'server', request: 'manager', config: { maxLicenses: 100 } });
    await expect(verifyAttribute(server, attr('pbs_license_min', '5000'))).resolves.toEqual({
      status: 'rejected',
      code: ErrorCodes.licenseMinBadValue,
      message: 'pbs_license_min is < 0, or > pbs_license_max pbs_license_min',
    });
  });

  it('hands back rewritten values', async () => {
    const context = await createTestContext();
    await expect(verifyAttribute(context, attr('Error_Path', 'err.log'))).resolves.toEqual({
      status: 'accepted',
      value: 'submit1:/home/user/err.log',
    });
  });

  it('resolves ACL hosts through the context resolver', async () => {
    const context = await createTestContext({
      object: 'server',
      request: 'manager',
      resolver: new FakeHostResolver({}),
    });

    await expect(verifyAttribute(context, attr('managers', 'root@*'))).resolves.toEqual({ status: 'accepted' });
    await expect(verifyAttribute(context, attr('operators', 'ops@gone'))).resolves.toEqual({
      status: 'rejected',
      code: ErrorCodes.badHost,
      message: 'Access from host not allowed, or unknown host operators',
    });
  });

  it('turns an exception inside a verifier into a fatal result', async () => {
    const failure = new Error('log sink closed');
    const warn = vi.fn();
    const context = await createTestContext({
      logger: {
        debug: () => {
          throw failure;
        },
        warn,
      },
    });

    const result = await verifyAttribute(context, attr('depend', 'whenever:1'));

    expect(result).toEqual({
      status: 'fatal',
      code: ErrorCodes.system,
      message: 'System error occurred',
      cause: failure,
    });
    expect(toStatusCode(result)).toBe(-1);
    expect(warn).toHaveBeenCalledWith('verifier for depend failed: log sink closed');
  });
});

describe('verifyAttributes', () => {
  it('returns the rewritten list when every attribute passes', async () => {
    const context = await createTestContext();
    const outcome = await verifyAttributes(context, [
      attr('Job_Name', 'build'),
      attr('Output_Path', 'out.log'),
      attr('Mail_Points', ' ae'),
    ]);

    expect(outcome).toEqual({
      ok: true,
      attributes: [
        attr('Job_Name', 'build'),
        attr('Output_Path', 'submit1:/home/user/out.log'),
        attr('Mail_Points', 'ae'),
      ],
    });
  });

  it('stops at the first failure', async () => {
    const context = await createTestContext();
    const outcome = await verifyAttributes(context, [
      attr('Job_Name', 'build'),
      attr('Hold_Types', 'pn'),
      attr('Priority', '9999'),
    ]);

    expect(outcome).toEqual({
      ok: false,
      index: 1,
      attribute: attr('Hold_Types', 'pn'),
      result: {
        status: 'rejected',
        code: ErrorCodes.badAttributeValue,
        message: 'Illegal attribute or resource value Hold_Types',
      },
    });
  });
});

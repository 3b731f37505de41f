import type { AttributeValue, ObjectKind, RequestKind } from '@batchguard/types';
import type { VerifierConfig } from '../../src/config/config.js';
import { loadDefinitionCatalog } from '../../src/definitions/loader.js';
import type { DefinitionCatalog } from '../../src/definitions/table.js';
import type { VerificationContext } from '../../src/verify/context.js';
import type { HostResolver } from '../../src/verify/host-resolver.js';
import { createVerificationContext, type CreateVerificationContextOptions } from '../../src/verify/registry.js';

export const testConfig: VerifierConfig = {
  maxLicenses: 100,
  aclHostCheck: true,
  defaultServer: 'svr1',
  submitHost: 'submit1',
  workingDirectory: '/home/user',
  definitions: {},
};

/**
 * In-process stand-in for DNS. Unknown hosts fail like a lookup would.
 */
export class FakeHostResolver implements HostResolver {
  readonly lookups: string[] = [];
  private readonly hosts: Map<string, string>;

  constructor(hosts: Record<string, string>) {
    this.hosts = new Map(Object.entries(hosts));
  }

  async resolveFullHostname(host: string): Promise<string> {
    this.lookups.push(host);
    const resolved = this.hosts.get(host.toLowerCase());
    if (resolved === undefined) {
      throw new Error(`getaddrinfo ENOTFOUND ${host}`);
    }
    return resolved;
  }
}

let catalogPromise: Promise<DefinitionCatalog> | undefined;

export function loadTestCatalog(): Promise<DefinitionCatalog> {
  if (catalogPromise === undefined) {
    catalogPromise = loadDefinitionCatalog();
  }
  return catalogPromise;
}

export interface TestContextOptions extends Partial<Omit<CreateVerificationContextOptions, 'config' | 'catalog'>> {
  config?: Partial<VerifierConfig>;
}

export async function createTestContext(options: TestContextOptions = {}): Promise<VerificationContext> {
  const { config, ...rest } = options;
  const request: RequestKind = options.request ?? 'queueJob';
  const object: ObjectKind = options.object ?? 'job';

  return createVerificationContext({
    resolver: new FakeHostResolver({}),
    ...rest,
    request,
    object,
    catalog: await loadTestCatalog(),
    config: { ...testConfig, ...config },
  });
}

export function attr(name: string, value: string | undefined, extra: Partial<AttributeValue> = {}): AttributeValue {
  return value === undefined
    ? { name, operator: 'set', ...extra }
    : { name, value, operator: 'set', ...extra };
}

import { lookup, lookupService } from 'node:dns/promises';

/**
 * Resolves a host name to its fully qualified form. The only blocking call
 * the verifiers make; callers bound it with their own timeout.
 */
export interface HostResolver {
  resolveFullHostname(host: string): Promise<string>;
}

export class DnsHostResolver implements HostResolver {
  async resolveFullHostname(host: string): Promise<string> {
    const { address } = await lookup(host);
    const { hostname } = await lookupService(address, 0);
    return hostname;
  }
}

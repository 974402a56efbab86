import { classifyDnsError, createResolverQuery, verifyDomain, type DnsResolverLike } from '../lib/dns';
import { InMemoryLRUAdapter } from '../lib/cache';
import { ConfigError } from '../lib/errors';
import type { DnsAnswer, DnsRecordType } from '../lib/types';

function dnsError(code: string): Error {
  return Object.assign(new Error(`query failed: ${code}`), { code });
}

function fakeQuery(answers: Record<string, DnsAnswer>) {
  return jest.fn(async (hostname: string, type: DnsRecordType): Promise<DnsAnswer> => {
    return answers[`${type} ${hostname}`] ?? { status: 'nxdomain' };
  });
}

describe('classifyDnsError', () => {
  test('maps resolver codes onto failure categories', () => {
    expect(classifyDnsError(dnsError('ENOTFOUND'))).toBe('nxdomain');
    expect(classifyDnsError(dnsError('ENODATA'))).toBe('no-answer');
    expect(classifyDnsError(dnsError('ESERVFAIL'))).toBe('refused');
    expect(classifyDnsError(dnsError('EREFUSED'))).toBe('refused');
    expect(classifyDnsError(dnsError('ETIMEOUT'))).toBe('timeout');
  });

  test('anything else is unresolved', () => {
    expect(classifyDnsError(dnsError('EBADNAME'))).toBe('unresolved');
    expect(classifyDnsError(new Error('boom'))).toBe('unresolved');
    expect(classifyDnsError('boom')).toBe('unresolved');
  });
});

describe('verifyDomain', () => {
  test('a null MX is rejected without any A query', async () => {
    const query = fakeQuery({ 'MX nullmx.test': { status: 'ok', records: ['.'] } });
    const result = await verifyDomain('nullmx.test', query);
    expect(result).toEqual({ domain: 'nullmx.test', mailCapable: false, outcome: { kind: 'not-mail-capable', reason: 'null-mx' } });
    expect(query).toHaveBeenCalledTimes(1);
    expect(query).toHaveBeenCalledWith('nullmx.test', 'MX');
  });

  test('an empty or localhost exchange is a null MX too', async () => {
    const empty = await verifyDomain('a.test', fakeQuery({ 'MX a.test': { status: 'ok', records: [''] } }));
    const local = await verifyDomain('b.test', fakeQuery({ 'MX b.test': { status: 'ok', records: ['mx.b.test', 'localhost'] } }));
    expect(empty.outcome).toEqual({ kind: 'not-mail-capable', reason: 'null-mx' });
    expect(local.outcome).toEqual({ kind: 'not-mail-capable', reason: 'null-mx' });
  });

  test('no MX falls back to a public A record on the domain', async () => {
    const query = fakeQuery({
      'MX plain.test': { status: 'no-answer' },
      'A plain.test': { status: 'ok', records: ['93.184.216.34'] },
    });
    const result = await verifyDomain('plain.test', query);
    expect(result.mailCapable).toBe(true);
    expect(result.outcome).toEqual({ kind: 'mail-capable' });
    expect(query.mock.calls).toEqual([
      ['plain.test', 'MX'],
      ['plain.test', 'A'],
    ]);
  });

  test('a loopback-only A record is not mail capable', async () => {
    const query = fakeQuery({
      'MX sink.test': { status: 'ok', records: [] },
      'A sink.test': { status: 'ok', records: ['127.0.0.1'] },
    });
    const result = await verifyDomain('sink.test', query);
    expect(result).toEqual({ domain: 'sink.test', mailCapable: false, outcome: { kind: 'not-mail-capable', reason: 'no-valid-address' } });
  });

  test('walks every exchange until one has a public answer', async () => {
    const query = fakeQuery({
      'MX multi.test': { status: 'ok', records: ['mx1.multi.test', 'mx2.multi.test.'] },
      'A mx1.multi.test': { status: 'ok', records: ['10.0.0.1'] },
      'A mx2.multi.test': { status: 'ok', records: ['1.2.3.4'] },
    });
    const result = await verifyDomain('multi.test', query);
    expect(result.mailCapable).toBe(true);
    expect(query).toHaveBeenCalledTimes(3);
  });

  test('one private address invalidates an exchange', async () => {
    const query = fakeQuery({
      'MX mixed.test': { status: 'ok', records: ['mx.mixed.test'] },
      'A mx.mixed.test': { status: 'ok', records: ['1.2.3.4', '192.168.0.1'] },
    });
    const result = await verifyDomain('mixed.test', query);
    expect(result.outcome).toEqual({ kind: 'not-mail-capable', reason: 'no-valid-address' });
  });

  test('duplicate exchanges are queried once', async () => {
    const query = fakeQuery({
      'MX dup.test': { status: 'ok', records: ['mx.dup.test', 'MX.DUP.TEST.'] },
      'A mx.dup.test': { status: 'ok', records: ['10.0.0.1'] },
    });
    await verifyDomain('dup.test', query);
    expect(query).toHaveBeenCalledTimes(2);
  });

  test('a domain that does not exist is not mail capable', async () => {
    const result = await verifyDomain('missing.test', fakeQuery({}));
    expect(result.outcome).toEqual({ kind: 'not-mail-capable', reason: 'no-valid-address' });
  });

  test('an empty MX answer falls through to the domain and stays definitive', async () => {
    const query = fakeQuery({
      'MX bare.test': { status: 'no-answer' },
      'A bare.test': { status: 'ok', records: ['127.0.0.1'] },
    });
    const result = await verifyDomain('bare.test', query);
    expect(result).toEqual({ domain: 'bare.test', mailCapable: false, outcome: { kind: 'not-mail-capable', reason: 'no-valid-address' } });
  });

  test('transient failures make the outcome indeterminate', async () => {
    const query = fakeQuery({
      'MX slow.test': { status: 'timeout' },
      'A slow.test': { status: 'timeout' },
    });
    const result = await verifyDomain('slow.test', query);
    expect(result).toEqual({ domain: 'slow.test', mailCapable: false, outcome: { kind: 'indeterminate', reason: 'timeout' } });
  });
});

describe('createResolverQuery', () => {
  function fakeResolver(): jest.Mocked<DnsResolverLike> {
    return {
      resolveMx: jest.fn<Promise<{ exchange: string; priority: number }[]>, [string]>(async () => [
        { exchange: 'mx.cached.test', priority: 10 },
      ]),
      resolve4: jest.fn<Promise<string[]>, [string]>(async () => ['1.2.3.4']),
    };
  }

  test('memoizes answers per hostname and record type', async () => {
    const resolver = fakeResolver();
    const query = createResolverQuery({ resolver, cache: new InMemoryLRUAdapter<DnsAnswer>({ max: 10 }) });

    expect(await query('cached.test', 'MX')).toEqual({ status: 'ok', records: ['mx.cached.test'] });
    expect(await query('cached.test', 'MX')).toEqual({ status: 'ok', records: ['mx.cached.test'] });
    expect(await query('cached.test', 'A')).toEqual({ status: 'ok', records: ['1.2.3.4'] });
    expect(resolver.resolveMx).toHaveBeenCalledTimes(1);
    expect(resolver.resolve4).toHaveBeenCalledTimes(1);
  });

  test('resolver identity is part of the cache key', async () => {
    const cache = new InMemoryLRUAdapter<DnsAnswer>({ max: 10 });
    const first = fakeResolver();
    const second = fakeResolver();
    await createResolverQuery({ resolver: first, cache, nameservers: ['192.0.2.1'] })('x.test', 'A');
    await createResolverQuery({ resolver: second, cache, nameservers: ['192.0.2.2'] })('x.test', 'A');
    expect(first.resolve4).toHaveBeenCalledTimes(1);
    expect(second.resolve4).toHaveBeenCalledTimes(1);
  });

  test('classifies failures and does not cache timeouts', async () => {
    const resolver = fakeResolver();
    resolver.resolve4.mockRejectedValueOnce(dnsError('ETIMEOUT')).mockResolvedValueOnce(['5.6.7.8']);
    const query = createResolverQuery({ resolver, cache: new InMemoryLRUAdapter<DnsAnswer>({ max: 10 }) });

    expect(await query('flaky.test', 'A')).toEqual({ status: 'timeout' });
    expect(await query('flaky.test', 'A')).toEqual({ status: 'ok', records: ['5.6.7.8'] });
    expect(resolver.resolve4).toHaveBeenCalledTimes(2);
  });

  test('a domain without MX records is judged on its A record', async () => {
    const resolver = fakeResolver();
    resolver.resolveMx.mockRejectedValue(dnsError('ENODATA'));
    resolver.resolve4.mockResolvedValue(['127.0.0.1']);
    const query = createResolverQuery({ resolver, cache: new InMemoryLRUAdapter<DnsAnswer>({ max: 10 }) });

    const result = await verifyDomain('nomx.test', query);

    expect(result).toEqual({ domain: 'nomx.test', mailCapable: false, outcome: { kind: 'not-mail-capable', reason: 'no-valid-address' } });
    expect(resolver.resolve4).toHaveBeenCalledWith('nomx.test');
  });

  test('query functions built without a cache share answers', async () => {
    const first = fakeResolver();
    const second = fakeResolver();
    const opts = { nameservers: ['192.0.2.53'], port: 5353 };

    await createResolverQuery({ ...opts, resolver: first })('shared.test', 'A');
    const answer = await createResolverQuery({ ...opts, resolver: second })('shared.test', 'A');

    expect(answer).toEqual({ status: 'ok', records: ['1.2.3.4'] });
    expect(first.resolve4).toHaveBeenCalledTimes(1);
    expect(second.resolve4).not.toHaveBeenCalled();
  });

  test('rejects a zero timeout', () => {
    expect(() => createResolverQuery({ resolver: fakeResolver(), timeoutMs: 0 })).toThrow(ConfigError);
  });

  test('caches definitive negative answers', async () => {
    const resolver = fakeResolver();
    resolver.resolveMx.mockRejectedValue(dnsError('ENOTFOUND'));
    const query = createResolverQuery({ resolver, cache: new InMemoryLRUAdapter<DnsAnswer>({ max: 10 }) });

    expect(await query('gone.test', 'MX')).toEqual({ status: 'nxdomain' });
    expect(await query('gone.test', 'MX')).toEqual({ status: 'nxdomain' });
    expect(resolver.resolveMx).toHaveBeenCalledTimes(1);
  });
});

import { describe, it, expect } from 'vitest';
import { parseNodeList, resolveTopology } from '../src/cluster/topology.js';
import { AmbiguousHead, ConfigurationError, HeadNotLocal } from '../src/errors.js';

describe('resolveTopology', () => {
  it('picks the locally bound node as head and keeps the rest in order', () => {
    const topology = resolveTopology(['10.0.0.1', '10.0.0.2', '10.0.0.3'], ['10.0.0.2']);

    expect(topology).toEqual({ head: '10.0.0.2', workers: ['10.0.0.1', '10.0.0.3'] });
  });

  it('ignores local addresses that are not cluster members', () => {
    const topology = resolveTopology(['192.168.1.5', '192.168.1.6'], ['172.17.0.1', '192.168.1.6']);

    expect(topology.head).toBe('192.168.1.6');
    expect(topology.workers).toEqual(['192.168.1.5']);
  });

  it('handles a single-node cluster', () => {
    expect(resolveTopology(['10.0.0.7'], ['10.0.0.7'])).toEqual({ head: '10.0.0.7', workers: [] });
  });

  it('fails with HeadNotLocal when no node is bound to this host', () => {
    expect(() => resolveTopology(['10.0.0.1', '10.0.0.3'], ['10.0.0.2'])).toThrow(HeadNotLocal);
  });

  it('rejects a node list that names this host twice', () => {
    try {
      resolveTopology(['10.0.0.1', '10.0.0.2', '10.0.1.2'], ['10.0.0.2', '10.0.1.2']);
      expect.fail('expected AmbiguousHead');
    } catch (error) {
      expect(error).toBeInstanceOf(AmbiguousHead);
      expect((error as AmbiguousHead).matches).toEqual(['10.0.0.2', '10.0.1.2']);
      expect((error as AmbiguousHead).kind).toBe('topology');
    }
  });
});

describe('parseNodeList', () => {
  it('keeps caller order and trims whitespace', () => {
    expect(parseNodeList(' 10.0.0.3, 10.0.0.1 ,10.0.0.2')).toEqual(['10.0.0.3', '10.0.0.1', '10.0.0.2']);
  });

  it('drops blanks and repeated addresses', () => {
    expect(parseNodeList('10.0.0.1,,10.0.0.2,10.0.0.1,')).toEqual(['10.0.0.1', '10.0.0.2']);
  });

  it('rejects entries that are not IPv4 addresses', () => {
    expect(() => parseNodeList('10.0.0.1,spark-02')).toThrow(ConfigurationError);
    expect(() => parseNodeList('10.0.0.256')).toThrow('Invalid node address "10.0.0.256"');
  });
});

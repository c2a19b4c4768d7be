import { describe, it, expect } from 'vitest';
import { antPathMatch, isAntPattern, wildcardMatch } from './wildcard.js';

describe('wildcardMatch', () => {
  it('matches * and ? case-insensitively by default', () => {
    expect(wildcardMatch('build.example.com', '*.example.com')).toBe(true);
    expect(wildcardMatch('Example.COM', 'example.com')).toBe(true);
    expect(wildcardMatch('a.b', 'a?b')).toBe(true);
    expect(wildcardMatch('example.com', '*.example.com')).toBe(false);
  });

  it('treats regex characters literally', () => {
    expect(wildcardMatch('axcom', 'a.com')).toBe(false);
    expect(wildcardMatch('a+b', 'a+b')).toBe(true);
  });

  it('honours case sensitivity when asked', () => {
    expect(wildcardMatch('README', 'readme', true)).toBe(false);
  });
});

describe('antPathMatch', () => {
  it('lets ** span directories and * stay in one segment', () => {
    expect(antPathMatch('/repo/**', '/repo/a/b')).toBe(true);
    expect(antPathMatch('/repo/**', '/repo')).toBe(true);
    expect(antPathMatch('/repo/*.git', '/repo/x.git')).toBe(true);
    expect(antPathMatch('/repo/*.git', '/repo/a/x.git')).toBe(false);
    expect(antPathMatch('/**/x.git', '/a/b/x.git')).toBe(true);
  });

  it('requires a leading slash on both or neither', () => {
    expect(antPathMatch('repo/**', '/repo/a')).toBe(false);
  });

  it('detects patterns', () => {
    expect(isAntPattern('/repo/**')).toBe(true);
    expect(isAntPattern('/repo/exact')).toBe(false);
  });
});

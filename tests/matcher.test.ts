import { describe, it, expect } from 'vitest';
import { compilePatterns, findMatch, matches } from '../src/matcher.js';

describe('matches', () => {
  it('matches a path against a directory glob', () => {
    expect(matches('/etc/passwd', ['/etc/*'])).toBe(true);
  });

  it('does not match a path outside the glob', () => {
    expect(matches('/tmp/file.txt', ['/etc/*'])).toBe(false);
  });

  it('matches a bare word anywhere in the path', () => {
    expect(matches('/a/b/secret/c.txt', ['secret'])).toBe(true);
  });

  it('returns false for an empty pattern list', () => {
    expect(matches('/etc/passwd', [])).toBe(false);
    expect(matches('', [])).toBe(false);
  });

  it('matches an exact path', () => {
    expect(matches('/etc/passwd', ['/etc/passwd'])).toBe(true);
  });

  it('supports ? as a single character', () => {
    expect(matches('/tmp/a1', ['/tmp/a?'])).toBe(true);
    expect(matches('/tmp/a12', ['/tmp/a?'])).toBe(false);
  });

  it('supports bracket classes', () => {
    expect(matches('/etc/shadow', ['/etc/[sp]*'])).toBe(true);
    expect(matches('/etc/hosts', ['/etc/[sp]*'])).toBe(false);
  });

  it('anchors globs to the whole path', () => {
    expect(matches('/var/etc/passwd', ['/etc/p*'])).toBe(false);
  });

  it('keeps * inside one path segment', () => {
    expect(matches('/etc/ssh/sshd_config', ['/etc/*'])).toBe(false);
  });

  it('treats ** like a single *', () => {
    expect(matches('/etc/ssh/sshd_config', ['/etc/**'])).toBe(false);
    expect(matches('/etc/passwd', ['/etc/**'])).toBe(true);
  });

  it('does not collapse repeated slashes', () => {
    expect(matches('/etc//passwd', ['/etc/*'])).toBe(false);
    expect(matches('/etc//passwd', ['/etc/*/passwd'])).toBe(true);
  });

  it('lets * match an empty trailing segment', () => {
    expect(matches('/etc/', ['/etc/*'])).toBe(true);
    expect(matches('/etc/', ['/etc/?'])).toBe(false);
  });

  it('matches dotfiles with *', () => {
    expect(matches('/home/user/.bashrc', ['/home/user/*'])).toBe(true);
  });

  it('reads a leading ! literally instead of negating', () => {
    expect(matches('/tmp/x', ['!/etc/passwd'])).toBe(false);
  });

  it('does not expand braces', () => {
    expect(matches('/etc/passwd', ['/etc/{passwd,shadow}'])).toBe(false);
  });

  it('matches when any pattern in the list matches', () => {
    expect(matches('/root/.ssh/id_rsa', ['/etc/*', '.ssh'])).toBe(true);
  });
});

describe('findMatch', () => {
  it('returns the first matching pattern', () => {
    const compiled = compilePatterns(['/tmp/*', 'passwd', '/etc/*']);
    expect(findMatch('/etc/passwd', compiled)).toBe('passwd');
  });

  it('returns null when nothing matches', () => {
    const compiled = compilePatterns(['/etc/*', 'secret']);
    expect(findMatch('/home/safe.txt', compiled)).toBeNull();
  });
});

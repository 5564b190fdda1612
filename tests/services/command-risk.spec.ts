import { describe, it, expect } from 'vitest';
import {
  classifyCommand,
  extractApprovalPattern,
  extractExecutable,
  requiresExplicitApproval,
  riskRank,
  shellOperatorsIn,
  shouldSandbox,
  validateCommand,
} from '../../src/services/command-risk.js';

describe('classifyCommand', () => {
  it.each([
    ['uname -a', 'safe'],
    ['ls -la', 'read'],
    ['git status', 'write'],
    ['rm -rf build', 'destructive'],
    ['sudo ls', 'privileged'],
    ['/usr/bin/rm file.txt', 'destructive'],
    ['frobnicate --now', 'read'],
    ['caffeinate -d', 'safe'],
    ['pbpaste', 'read'],
    ['diskutil list', 'write'],
    ['defaults write com.example key 1', 'write'],
    ['swift build', 'write'],
    ['dd if=a.img of=b.img', 'destructive'],
    ['launchctl list', 'privileged'],
  ])('classifies %s as %s', (command, level) => {
    expect(classifyCommand(command)).toBe(level);
  });

  it('treats output redirection as a write', () => {
    expect(classifyCommand('echo hi > out.txt')).toBe('write');
    expect(classifyCommand('cat a.txt | tee b.txt')).toBe('write');
  });

  it('keeps the stronger executable level over redirection', () => {
    expect(classifyCommand('rm a > log.txt')).toBe('destructive');
  });
});

describe('shell operators', () => {
  it('reports each operator once, longer ones first', () => {
    expect(shellOperatorsIn('make && ./run | grep ok')).toEqual(['&&', '|']);
    expect(shellOperatorsIn('echo $(whoami)')).toEqual(['$(']);
    expect(shellOperatorsIn('ls -la')).toEqual([]);
  });

  it('treats line breaks as command separators', () => {
    expect(shellOperatorsIn('df\nrm -rf /')).toEqual(['\n']);
    expect(shellOperatorsIn('df\r\nwhoami')).toEqual(['\n', '\r']);
    expect(requiresExplicitApproval('df\nrm -rf /')).toBe(true);
  });
});

describe('validateCommand', () => {
  it('refuses privileged commands', () => {
    expect(validateCommand('sudo rm -rf /')).toEqual({
      isValid: false,
      issues: ["'sudo' is a privileged command and is never executed."],
      hasShellOperators: false,
      riskLevel: 'privileged',
    });
  });

  it('flags but allows shell operators', () => {
    const validation = validateCommand('ls | wc -l');
    expect(validation.isValid).toBe(true);
    expect(validation.hasShellOperators).toBe(true);
    expect(validation.riskLevel).toBe('read');
  });

  it('rejects empty, oversized and null-byte commands', () => {
    expect(validateCommand('   ').issues).toEqual(['Command is empty.']);
    expect(validateCommand('ls\0').issues).toEqual(['Command contains a null byte.']);
    expect(validateCommand(`echo ${'a'.repeat(10_000)}`).issues).toEqual([
      'Command exceeds the maximum length of 10000 characters.',
    ]);
  });
});

describe('approval helpers', () => {
  it('requires explicit approval for destructive, privileged and chained commands', () => {
    expect(requiresExplicitApproval('rm file')).toBe(true);
    expect(requiresExplicitApproval('sudo whoami')).toBe(true);
    expect(requiresExplicitApproval('ls; whoami')).toBe(true);
    expect(requiresExplicitApproval('ls -la')).toBe(false);
  });

  it('widens patterns only for non-destructive commands', () => {
    expect(extractApprovalPattern('df -h')).toBe('df *');
    expect(extractApprovalPattern('git status')).toBe('git *');
    expect(extractApprovalPattern('chmod -R 755 dir')).toBe('chmod -R *');
    expect(extractApprovalPattern('  rm -rf build  ')).toBe('rm -rf build');
  });

  it('reduces the executable to its base name', () => {
    expect(extractExecutable('  /bin/ls -la')).toBe('ls');
    expect(extractExecutable('')).toBe('');
    expect(extractExecutable('df\nrm -rf /')).toBe('df');
    expect(extractExecutable('sudo\nls')).toBe('sudo');
  });

  it('sandboxes only safe and read commands', () => {
    expect(shouldSandbox('safe')).toBe(true);
    expect(shouldSandbox('read')).toBe(true);
    expect(shouldSandbox('write')).toBe(false);
    expect(riskRank('privileged')).toBe(4);
    expect(riskRank('safe')).toBe(0);
  });
});

/**
 * Safety rule tables
 * Substring patterns are matched against the lower-cased fix text; credential
 * patterns are case-insensitive regexes over the original text.
 */

import type { FaultType } from '@remedyops/shared';

export interface PatternRule {
  pattern: string;
  description: string;
}

export interface RegexRule {
  pattern: RegExp;
  description: string;
}

export const DESTRUCTIVE_COMMANDS: readonly PatternRule[] = [
  { pattern: 'rm -rf /', description: 'Recursive root deletion' },
  { pattern: 'rm -rf', description: 'Recursive force deletion' },
  { pattern: 'drop table', description: 'SQL table deletion' },
  { pattern: 'drop database', description: 'Database deletion' },
  { pattern: 'truncate', description: 'Data truncation' },
  { pattern: 'format c:', description: 'Disk format' },
  { pattern: 'fdisk', description: 'Disk partitioning' },
  { pattern: 'mkfs', description: 'Filesystem creation' },
  { pattern: 'dd if=/dev/zero', description: 'Disk zeroing' },
  { pattern: ':(){ :|:& };:', description: 'Fork bomb' },
  { pattern: '> /dev/sda', description: 'Direct disk write' },
  // Compared against lower-cased text as written, so the upper-case flag never matches
  { pattern: 'chmod -R 777 /', description: 'Recursive permission change' },
];

export const DATA_LOSS_PATTERNS: readonly PatternRule[] = [
  { pattern: 'delete from', description: 'SQL row deletion' },
  { pattern: 'drop ', description: 'SQL object deletion' },
  { pattern: 'truncate ', description: 'Table truncation' },
  { pattern: 'remove all', description: 'Bulk removal' },
  { pattern: 'purge', description: 'Data purge' },
  { pattern: 'wipe', description: 'Data wipe' },
  { pattern: 'destroy', description: 'Resource destruction' },
];

export const SECURITY_PATTERNS: readonly PatternRule[] = [
  { pattern: 'chmod 777', description: 'World-writable permissions' },
  { pattern: 'chmod 666', description: 'World-writable file' },
  { pattern: 'password=', description: 'Hardcoded password' },
  { pattern: 'secret=', description: 'Hardcoded secret' },
  { pattern: 'disable_auth', description: 'Authentication disabled' },
  { pattern: 'allow_all', description: 'Allow-all policy' },
  { pattern: 'skip-grant-tables', description: 'MySQL privilege bypass' },
  { pattern: 'nosql injection', description: 'Injection vulnerability' },
  { pattern: 'eval(', description: 'Code injection via eval' },
  { pattern: 'exec(', description: 'Code injection via exec' },
  { pattern: '__import__', description: 'Dynamic import' },
];

export const CREDENTIAL_PATTERNS: readonly RegexRule[] = [
  { pattern: /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}/i, description: 'Email address' },
  { pattern: /sk-[a-zA-Z0-9]{20,}/i, description: 'API key pattern' },
  { pattern: /-----BEGIN (RSA |EC )?PRIVATE KEY/i, description: 'Private key' },
  { pattern: /aws_secret_access_key/i, description: 'AWS secret' },
  { pattern: /AKIA[0-9A-Z]{16}/i, description: 'AWS access key' },
  { pattern: /\b\d{3}-\d{2}-\d{4}\b/i, description: 'SSN pattern' },
];

export const ROLLBACK_INDICATORS: readonly string[] = ['backup', 'restore', 'revert', 'rollback', '.bak', 'undo'];

export const COHERENCE_KEYWORDS: Partial<Record<FaultType, readonly string[]>> = {
  crash: ['restart', 'start', 'process', 'run'],
  bad_config: ['config', 'json', 'restore', 'backup'],
  bug: ['handler', 'fix', 'restore', 'revert', 'code'],
  slow: ['sleep', 'remove', 'handler', 'restore', 'timeout'],
};

export const BROAD_SCOPE_PATTERNS: readonly string[] = ['find /', 'sed -i', 'for file in', 'glob.glob'];

export const CRITICAL_CHECKS = [
  'noDestructiveCommands',
  'noDataLoss',
  'noSecurityRegression',
  'noCredentialExposure',
] as const;

export const ADVISORY_CHECKS = ['rollbackPossible', 'fixFaultCoherence', 'minimalScope'] as const;

export type CriticalCheck = (typeof CRITICAL_CHECKS)[number];
export type AdvisoryCheck = (typeof ADVISORY_CHECKS)[number];
export type SafetyCheckName = CriticalCheck | AdvisoryCheck;

/**
 * Forensic artifact category inference from a source name and its columns.
 */

interface ArtifactRule {
  artifact: string;
  matches: (name: string, columns: string) => boolean;
}

const has = (text: string, ...parts: string[]): boolean => parts.every(p => text.includes(p));

/**
 * Ordered; first hit wins. A name carrying both "event" and "log" is a
 * generic Event Log even when it also names a channel.
 */
const ARTIFACT_RULES: readonly ArtifactRule[] = [
  { artifact: 'Amcache', matches: (n, c) => has(n, 'amcache') || has(c, 'amcache') },
  { artifact: 'Prefetch', matches: (n, c) => has(n, 'prefetch') || has(c, 'prefetch') },
  { artifact: 'Shimcache', matches: (n, c) => has(n, 'shimcache') || has(c, 'shimcache') },
  { artifact: 'Event Log', matches: n => has(n, 'event', 'log') },
  { artifact: 'Sysmon Event Log', matches: n => has(n, 'sysmon') },
  { artifact: 'Security Event Log', matches: n => has(n, 'security', 'log') },
  { artifact: 'Application Event Log', matches: n => has(n, 'application', 'log') },
  { artifact: 'System Event Log', matches: n => has(n, 'system', 'log') },
  { artifact: 'Process List', matches: n => has(n, 'process') },
  { artifact: 'Network Connection', matches: n => has(n, 'network') || has(n, 'connection') },
  { artifact: 'File System', matches: n => has(n, 'file') },
  { artifact: 'Registry', matches: n => has(n, 'registry') },
];

/**
 * Infer the artifact type. Falls back to the source name unchanged.
 *
 * @example inferArtifactType('Prefetch_Parsed', []) => 'Prefetch'
 * @example inferArtifactType('custom_export', ['amcache_key']) => 'Amcache'
 */
export function inferArtifactType(sourceName: string, columns: readonly string[] = []): string {
  const name = sourceName.toLowerCase();
  const joined = columns.map(c => c.toLowerCase()).join(' ');
  const rule = ARTIFACT_RULES.find(r => r.matches(name, joined));
  return rule ? rule.artifact : sourceName;
}

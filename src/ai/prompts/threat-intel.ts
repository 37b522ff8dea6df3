/**
 * Prompt template for threat-actor intelligence lookups.
 */

export function buildThreatIntelPrompt(threatActor: string): { system: string; user: string } {
  const system = `You are a cybersecurity threat intelligence analyst. You summarize publicly reported tradecraft and indicators for named threat actor groups.

Rules:
- Report only indicators that have been publicly attributed to the group
- Do not invent indicators; return empty lists when unsure
- Use plain (refanged) values: example.com, not example[.]com
- Respond with a single JSON object and nothing else`;

  const user = `Threat actor group: ${threatActor}

Provide:
1. Known TTPs (tactics, techniques and procedures) used by this group
2. Known IOCs associated with this group: IP addresses, domains, file hashes (MD5, SHA1, SHA256), email addresses, executable names, registry keys, user agents, other indicators

Respond in this JSON format:
{
  "threat_actor": "${threatActor}",
  "ttps": [
    { "tactic": "Tactic name", "technique": "Technique ID or name", "description": "Description of the TTP" }
  ],
  "iocs": {
    "ip_addresses": [],
    "domains": [],
    "file_hashes": [],
    "email_addresses": [],
    "executables": [],
    "registry_keys": [],
    "user_agents": [],
    "other": []
  },
  "sources": []
}`;

  return { system, user };
}

import type { StructuredQuery } from './types.js';

/**
 * Canonical text for a structured query, in fixed field order:
 *
 * `Job Title: <title> | Required Skills: <a, b> | Experience Level: <level>`
 * followed by ` | Context: <context>` when context is non-blank.
 */
export function buildQueryText(query: StructuredQuery): string {
  const skills = query.skills
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .join(', ');

  const parts = [
    `Job Title: ${query.title.trim()}`,
    `Required Skills: ${skills}`,
    `Experience Level: ${query.experienceLevel.trim()}`,
  ];

  const context = query.context?.trim();
  if (context) {
    parts.push(`Context: ${context}`);
  }

  return parts.join(' | ');
}

/**
 * Split a comma-separated skills string (CLI and HTTP inputs).
 */
export function parseSkills(raw: string): string[] {
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

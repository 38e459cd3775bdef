/**
 * Prompt construction for grounded explanations.
 *
 * The model sees only the retrieved records. The instruction to recommend
 * solely from that set is a soft contract: responses are not validated
 * against it.
 */

import type { Query, RetrievalResult } from '../retrieval/types.js';

/**
 * One retrieved record as a context block.
 */
export function formatAssessmentContext(result: RetrievalResult): string {
  const { record } = result;
  return [
    `Assessment: ${record.name}`,
    `Category: ${record.category}`,
    `Description: ${record.description}`,
    `Skills Measured: ${record.skillsMeasured}`,
    `Job Suitability: ${record.jobSuitability}`,
    `Experience Levels: ${record.experienceLevel}`,
    `Duration: ${record.duration}`,
    `Relevance Score: ${result.similarityScore.toFixed(2)}`,
  ].join('\n');
}

function describeQuery(query: Query): string {
  if (typeof query === 'string') {
    return `HIRING QUERY: ${query.trim()}`;
  }

  const lines = [
    'HIRING REQUIREMENTS:',
    `- Job Title: ${query.title.trim()}`,
    `- Required Skills: ${query.skills.map((s) => s.trim()).filter(Boolean).join(', ')}`,
    `- Experience Level: ${query.experienceLevel.trim()}`,
  ];
  const context = query.context?.trim();
  if (context) {
    lines.push(`- Additional Context: ${context}`);
  }
  return lines.join('\n');
}

/**
 * User message for the explanation request.
 */
export function buildExplanationPrompt(query: Query, results: RetrievalResult[]): string {
  const catalog = results.map(formatAssessmentContext).join('\n---\n');

  return `${describeQuery(query)}

AVAILABLE ASSESSMENTS (from catalog):
${catalog}

TASK:
Based ONLY on the assessments provided above, recommend the top 3-5 most suitable assessments for this role. For each recommendation:

1. State the assessment name
2. Explain why it is relevant for this role
3. Highlight which required skills or competencies it addresses
4. Mention important considerations (duration, experience level match)

Format your response as a numbered list. Only recommend assessments from the catalog above.`;
}

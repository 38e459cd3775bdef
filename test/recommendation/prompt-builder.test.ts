import { describe, it, expect } from 'vitest';
import { buildExplanationPrompt, formatAssessmentContext } from '../../src/recommendation/prompt-builder.js';
import type { RetrievalResult } from '../../src/retrieval/types.js';
import { makeRecord } from '../helpers/records.js';

const result: RetrievalResult = {
  rank: 1,
  similarityScore: 0.8237,
  record: makeRecord({
    name: 'Java Programming',
    category: 'Technical',
    description: 'Core Java skills',
    skillsMeasured: ['Java', 'OOP'],
    jobSuitability: 'Developer',
    experienceLevel: 'Mid',
    duration: '40 minutes',
  }),
};

describe('formatAssessmentContext', () => {
  it('renders one line per field with a two-decimal score', () => {
    expect(formatAssessmentContext(result)).toBe(
      [
        'Assessment: Java Programming',
        'Category: Technical',
        'Description: Core Java skills',
        'Skills Measured: Java, OOP',
        'Job Suitability: Developer',
        'Experience Levels: Mid',
        'Duration: 40 minutes',
        'Relevance Score: 0.82',
      ].join('\n'),
    );
  });
});

describe('buildExplanationPrompt', () => {
  it('describes structured requirements', () => {
    const prompt = buildExplanationPrompt(
      { title: ' Backend Engineer ', skills: ['Java', ' ', 'SQL'], experienceLevel: 'Senior', context: 'fintech' },
      [result],
    );

    expect(prompt.startsWith(
      'HIRING REQUIREMENTS:\n' +
        '- Job Title: Backend Engineer\n' +
        '- Required Skills: Java, SQL\n' +
        '- Experience Level: Senior\n' +
        '- Additional Context: fintech\n\n' +
        'AVAILABLE ASSESSMENTS (from catalog):\n' +
        'Assessment: Java Programming\n',
    )).toBe(true);
  });

  it('describes free-text queries', () => {
    const prompt = buildExplanationPrompt('  need a java dev ', [result]);
    expect(prompt.split('\n')[0]).toBe('HIRING QUERY: need a java dev');
  });

  it('separates context blocks and ends with the catalog-only instruction', () => {
    const second: RetrievalResult = { ...result, rank: 2, record: makeRecord({ name: 'SQL Basics' }) };

    const prompt = buildExplanationPrompt('sql', [result, second]);

    expect(prompt).toContain('Relevance Score: 0.82\n---\nAssessment: SQL Basics\n');
    expect(prompt).toContain('Based ONLY on the assessments provided above, recommend the top 3-5');
    expect(prompt.endsWith('Only recommend assessments from the catalog above.')).toBe(true);
  });
});

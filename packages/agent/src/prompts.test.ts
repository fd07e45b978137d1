import { describe, expect, it } from 'vitest';
import { getSystemPrompt } from './prompts.js';

describe('getSystemPrompt', () => {
  it('should include the current date', () => {
    expect(getSystemPrompt(new Date('2024-03-05T12:00:00Z'))).toContain(
      'Current date: 2024-03-05',
    );
  });

  it('should name every tool in the order they are meant to be used', () => {
    const prompt = getSystemPrompt();
    const positions = [
      'get_dcid',
      'get_available_variables',
      'get_population_count',
    ].map((tool) => prompt.indexOf(`**${tool}**`));
    expect(positions.every((position) => position >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });
});

import { describe, it, expect } from 'vitest';
import { Decider } from '../decider.js';
import { createCompletion } from './fakes.js';

describe('Decider', () => {
  it('routes to the database on YES', async () => {
    const decider = new Decider(createCompletion({ decision: 'YES' }), 3);
    await expect(decider.needsDatabase('How many users signed up?', [])).resolves.toBe(true);
  });

  it('answers directly on NO', async () => {
    const decider = new Decider(createCompletion({ decision: 'NO' }), 3);
    await expect(decider.needsDatabase('Hello', [])).resolves.toBe(false);
  });

  it('matches YES anywhere and in any case', async () => {
    await expect(new Decider(createCompletion({ decision: '  yes.\n' }), 3).needsDatabase('q', [])).resolves.toBe(true);
    await expect(new Decider(createCompletion({ decision: 'NO, YES I mean' }), 3).needsDatabase('q', [])).resolves.toBe(true);
  });

  it('treats unrelated replies as NO', async () => {
    const decider = new Decider(createCompletion({ decision: 'Maybe' }), 3);
    await expect(decider.needsDatabase('q', [])).resolves.toBe(false);
  });

  it('includes only the most recent turns in the prompt', async () => {
    const completion = createCompletion({ decision: 'YES' });
    const decider = new Decider(completion, 2);
    const memory = [
      { question: 'oldest question', answer: 'oldest answer' },
      { question: 'middle question', answer: 'middle answer' },
      { question: 'latest question', answer: 'latest answer' },
    ];

    await decider.needsDatabase('what about them?', memory);

    const prompt = completion.complete.mock.calls[0][0];
    expect(prompt).toContain('Recent conversation:\nQ: middle question\nA: middle answer\nQ: latest question\nA: latest answer');
    expect(prompt).not.toContain('oldest');
    expect(prompt).toContain('Current question: "what about them?"');
  });

  it('leaves out the conversation header when memory is empty', async () => {
    const completion = createCompletion();
    await new Decider(completion, 3).needsDatabase('Hello', []);
    expect(completion.complete.mock.calls[0][0]).not.toContain('Recent conversation:');
  });

  it('propagates completion failures', async () => {
    const decider = new Decider(createCompletion({ decision: new Error('unreachable') }), 3);
    await expect(decider.needsDatabase('q', [])).rejects.toThrow('unreachable');
  });
});

import { parseChatRequest } from './chat-request.parser';
import { InvalidInputError } from './chat.errors';

const QUESTION_ERROR =
  "Field 'question' is required and must be a non-empty string.";

describe('parseChatRequest', () => {
  it('should trim the question and apply the default model', () => {
    expect(parseChatRequest({ question: '  Hi  ' })).toEqual({
      question: 'Hi',
      model: 'gpt-4o-mini',
      systemPrompt: undefined,
    });
  });

  it('should trim a provided model', () => {
    const request = parseChatRequest({ question: 'Hi', model: '  gpt-4o  ' });

    expect(request.model).toBe('gpt-4o');
  });

  it.each([['   '], [''], [42], [null]])(
    'should fall back to the default model for %p',
    (model) => {
      expect(parseChatRequest({ question: 'Hi', model }).model).toBe(
        'gpt-4o-mini',
      );
    },
  );

  it('should keep a string system prompt unchanged', () => {
    const request = parseChatRequest({
      question: 'Hi',
      system_prompt: ' Be brief. ',
    });

    expect(request.systemPrompt).toBe(' Be brief. ');
  });

  it('should drop a system prompt that is not a string', () => {
    const request = parseChatRequest({ question: 'Hi', system_prompt: 5 });

    expect(request.systemPrompt).toBeUndefined();
  });

  describe('invalid bodies', () => {
    it.each([
      ['an empty object', {}],
      ['an empty question', { question: '' }],
      ['a whitespace-only question', { question: ' \n\t ' }],
      ['a numeric question', { question: 42 }],
      ['a null question', { question: null }],
      ['a null body', null],
      ['a string body', 'Hi'],
      ['an array body', ['Hi']],
    ])('should reject %s', (_label, body) => {
      expect(() => parseChatRequest(body)).toThrow(InvalidInputError);
      expect(() => parseChatRequest(body)).toThrow(QUESTION_ERROR);
    });
  });
});

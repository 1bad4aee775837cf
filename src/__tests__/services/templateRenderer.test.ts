/**
 * Template Renderer Tests
 *
 * Strict rendering: every referenced variable must exist in the context.
 */

import {
  collectVariableReferences,
  lookupVariable,
  NOT_FOUND,
  renderTemplate,
} from '../../services/email/templateRenderer';
import { TemplateSyntaxError, UndefinedVariableError } from '../../services/email/errors';

// ========================================
// RENDERING TESTS
// ========================================

describe('renderTemplate()', () => {
  it('should substitute context variables', () => {
    expect(renderTemplate('Hello {{ first_name }}!', { first_name: 'Ann' })).toBe('Hello Ann!');
  });

  it('should not escape HTML in values', () => {
    expect(renderTemplate('<div>{{ content }}</div>', { content: '<p>A & B</p>' })).toBe(
      '<div><p>A & B</p></div>'
    );
  });

  it('should return an empty string for an empty body', () => {
    expect(renderTemplate('', {})).toBe('');
  });

  it('should render conditionals and loops', () => {
    const body = '{{#if vip}}VIP {{/if}}{{#each items}}[{{this}}]{{/each}}';
    expect(renderTemplate(body, { vip: 'yes', items: ['a', 'b'] })).toBe('VIP [a][b]');
    expect(renderTemplate(body, { vip: '', items: [] })).toBe('');
  });

  describe('undefined variables', () => {
    it('should reject a missing variable before rendering', () => {
      expect(() => renderTemplate('Hello {{ last_name }}', { first_name: 'Ann' })).toThrow(
        new UndefinedVariableError('last_name')
      );
    });

    it('should report the variable in the message', () => {
      expect(() => renderTemplate('{{ last_name }}', {})).toThrow(
        "Undefined variable: 'last_name' is undefined"
      );
    });

    it('should reject a missing variable used only as a condition', () => {
      expect(() => renderTemplate('{{#if vip}}x{{/if}}', {})).toThrow(UndefinedVariableError);
    });

    it('should reject a missing helper argument', () => {
      expect(() => renderTemplate('{{upper nickname}}', {})).toThrow(new UndefinedVariableError('nickname'));
    });

    it('should reject a missing nested property', () => {
      expect(() => renderTemplate('{{ user.name }}', { user: {} })).toThrow(
        new UndefinedVariableError('name')
      );
    });

    it('should accept present but empty values', () => {
      expect(renderTemplate('[{{ middle_name }}]', { middle_name: '' })).toBe('[]');
    });
  });

  it('should translate malformed syntax', () => {
    expect(() => renderTemplate('{{#if vip}}unclosed', { vip: 'yes' })).toThrow(TemplateSyntaxError);
  });
});

// ========================================
// HELPER TESTS
// ========================================

describe('template helpers', () => {
  const context = { name: 'ann lee', nickname: '', tags: ['a', 'b'] };

  it.each([
    ['{{upper name}}', 'ANN LEE'],
    ['{{lower "ANN"}}', 'ann'],
    ['{{capitalize name}}', 'Ann lee'],
    ['{{title name}}', 'Ann Lee'],
    ['{{trim "  x  "}}', 'x'],
    ['{{replace name "lee" "smith"}}', 'ann smith'],
    ['{{truncate name 6}}', 'ann...'],
    ['{{join tags " / "}}', 'a / b'],
    ['{{join tags}}', 'a, b'],
    ['{{default nickname "friend"}}', 'friend'],
    ['{{default name "friend"}}', 'ann lee'],
  ])('should render %s', (body, expected) => {
    expect(renderTemplate(body, context)).toBe(expected);
  });

  it('should let default take a variable that does not exist', () => {
    expect(renderTemplate('Hi {{default nickname "friend"}}', {})).toBe('Hi friend');
  });

  it('should format dates', () => {
    expect(renderTemplate('{{date when}}', { when: '2024-03-05T12:00:00Z' })).toBe('March 5, 2024');
  });

  it('should resolve a column named like a helper to its value', () => {
    expect(renderTemplate('{{ title }} {{ upper name }}', { title: 'Dr', name: 'lee' })).toBe('Dr LEE');
  });
});

// ========================================
// REFERENCE COLLECTION TESTS
// ========================================

describe('collectVariableReferences()', () => {
  it('should list root references once, in order', () => {
    const body = '{{ a }} {{#if b}}{{ a }}{{/if}} {{upper c}} {{#each items}}{{ inner }}{{/each}}';
    expect(collectVariableReferences(body)).toEqual(['a', 'b', 'c', 'items']);
  });

  it('should not count helper names or data variables', () => {
    expect(collectVariableReferences('{{upper x}} {{#each list}}{{@index}}{{/each}}')).toEqual([
      'x',
      'list',
    ]);
  });
});

describe('lookupVariable()', () => {
  it('should distinguish missing keys from undefined values', () => {
    expect(lookupVariable({ a: undefined }, 'a')).toBeUndefined();
    expect(lookupVariable({}, 'a')).toBe(NOT_FOUND);
  });

  it('should ignore inherited properties', () => {
    expect(lookupVariable({}, 'toString')).toBe(NOT_FOUND);
  });
});

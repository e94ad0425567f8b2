import { describe, expect, it } from 'vitest';
import {
  isValidTemplate,
  isVariableName,
  renderTemplate,
  templateVariables,
} from '../../../src/engine/template.js';
import { InvalidTemplateError } from '../../../src/utils/errors.js';

function vars(values: Record<string, string>) {
  return (name: string) => values[name] ?? '';
}

describe('renderTemplate', () => {
  it('substitutes ${name} placeholders', () => {
    expect(renderTemplate('echo ${greeting}, ${who}!', vars({ greeting: 'hello', who: 'world' }))).toBe(
      'echo hello, world!',
    );
  });

  it('trims whitespace inside the braces', () => {
    expect(renderTemplate('echo ${ name }', vars({ name: 'x' }))).toBe('echo x');
  });

  it('renders unknown variables as the empty string', () => {
    expect(renderTemplate('echo [${missing}]', vars({}))).toBe('echo []');
  });

  it('leaves shell-style $ references alone', () => {
    expect(renderTemplate('echo $HOME $1 ${x} $', vars({ x: 'y' }))).toBe('echo $HOME $1 y $');
  });

  it('does not re-scan substituted values', () => {
    expect(renderTemplate('echo ${a}', vars({ a: '${b}', b: 'nested' }))).toBe('echo ${b}');
  });

  it('returns text without placeholders unchanged', () => {
    expect(renderTemplate('ls -la', vars({}))).toBe('ls -la');
  });

  it('rejects an unterminated placeholder', () => {
    expect(() => renderTemplate('echo ${name', vars({}))).toThrow(InvalidTemplateError);
    expect(() => renderTemplate('echo ${name', vars({}))).toThrow(
      'Invalid template: echo ${name (unterminated placeholder at 5)',
    );
  });

  it.each(['${}', '${1abc}', '${a-b}', '${a b}'])('rejects invalid name in %j', (template) => {
    expect(() => renderTemplate(template, vars({}))).toThrow(InvalidTemplateError);
    expect(isValidTemplate(template)).toBe(false);
  });
});

describe('template filters', () => {
  const lookup = vars({
    name: '  Ada Lovelace ',
    files: '["a.txt", "b.txt", "c.txt"]',
    nested: '[{"id": 1}]',
    empty: '[]',
    obj: '{"ok":true}',
  });

  it.each([
    ['${name | upper}', '  ADA LOVELACE '],
    ['${name|lower}', '  ada lovelace '],
    ['${name | trim}', 'Ada Lovelace'],
    ['${name | trim | upper}', 'ADA LOVELACE'],
    ['${name | trim | length}', '12'],
    ['${name | trim | first}', 'A'],
    ['${name | trim | last}', 'e'],
  ])('applies %j to text', (template, expected) => {
    expect(renderTemplate(template, lookup)).toBe(expected);
  });

  it('treats captured JSON arrays as lists', () => {
    expect(renderTemplate('${files | length} ${files | count}', lookup)).toBe('3 3');
    expect(renderTemplate('${files | first}..${files | last}', lookup)).toBe('a.txt..c.txt');
    expect(renderTemplate('${nested | first}', lookup)).toBe('{"id":1}');
    expect(renderTemplate('[${empty | first}] ${empty | length}', lookup)).toBe('[] 0');
  });

  it('pretty-prints JSON and passes other text through', () => {
    expect(renderTemplate('${obj | json}', lookup)).toBe('{\n  "ok": true\n}');
    expect(renderTemplate('${name | json}', lookup)).toBe('  Ada Lovelace ');
  });

  it('counts characters, not UTF-16 units', () => {
    expect(renderTemplate('${word | length}', vars({ word: 'héllo😀' }))).toBe('6');
  });

  it('rejects an unknown filter', () => {
    expect(() => renderTemplate('echo ${name | reverse}', lookup)).toThrow(
      "Invalid template: echo ${name | reverse} (unknown filter 'reverse' at 5)",
    );
    expect(isValidTemplate('${name | }')).toBe(false);
  });

  it('reports only the variable name of a filtered reference', () => {
    expect(templateVariables('${files | length} ${files}')).toEqual(['files']);
  });
});

describe('templateVariables', () => {
  it('lists names in order of first appearance', () => {
    expect(templateVariables('${b} ${a} ${b} $HOME')).toEqual(['b', 'a']);
  });

  it('returns an empty list for plain text', () => {
    expect(templateVariables('echo hi')).toEqual([]);
  });
});

describe('isVariableName', () => {
  it('accepts identifiers', () => {
    expect(isVariableName('build_id')).toBe(true);
    expect(isVariableName('_x9')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isVariableName('9lives')).toBe(false);
    expect(isVariableName('with-dash')).toBe(false);
    expect(isVariableName('')).toBe(false);
  });
});

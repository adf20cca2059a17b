import { describe, expect, it } from 'vitest';

import { PromptRegistry, ResourceRegistry, ToolRegistry, compileUriTemplate, validateArguments } from '../src/server/registry';
import { conformsTo, findArgumentProblem, parametersToSchema } from '../src/server/parameters';
import { MCPError, ProtocolError } from '../src/core/errors';

const noop = (): string => '';

describe('parametersToSchema', () => {
  it('makes every parameter required unless marked optional', () => {
    expect(
      parametersToSchema({
        a: 'number',
        unit: { type: 'string', description: 'Unit name', required: false, enum: ['m', 'km'] }
      })
    ).toEqual({
      type: 'object',
      properties: {
        a: { type: 'number' },
        unit: { type: 'string', description: 'Unit name', enum: ['m', 'km'] }
      },
      required: ['a']
    });
  });
});

describe('argument validation', () => {
  const schema = parametersToSchema({ a: 'number', b: 'integer', tag: { type: 'string', required: false } });

  it('reports the first problem', () => {
    expect(findArgumentProblem(schema, { a: 1 })).toBe('Missing required argument: b');
    expect(findArgumentProblem(schema, { a: 'one', b: 2 })).toBe('Argument a has wrong type, expected number');
    expect(findArgumentProblem(schema, { a: 1, b: 2.5 })).toBe('Argument b has wrong type, expected integer');
    expect(findArgumentProblem(schema, { a: 1, b: 2, tag: 'x' })).toBeUndefined();
  });

  it('lets extra arguments through', () => {
    expect(conformsTo(schema, { a: 1, b: 2, extra: true })).toBe(true);
  });

  it('raises INVALID_PARAMS', () => {
    try {
      validateArguments(schema, {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toMatchObject({ code: -32602, message: 'Missing required argument: a' });
    }
  });

  it('checks enums', () => {
    const units = parametersToSchema({ unit: { type: 'string', enum: ['m', 'km'] } });
    expect(findArgumentProblem(units, { unit: 'mi' })).toBe('Argument unit must be one of: m, km');
  });
});

describe('ToolRegistry', () => {
  it('keeps registration order and refuses duplicates', () => {
    const registry = new ToolRegistry();
    const inputSchema = parametersToSchema({});
    registry.register({ name: 'b', description: 'B', inputSchema, handler: noop });
    registry.register({ name: 'a', description: 'A', inputSchema, handler: noop, annotations: { readOnlyHint: true } });

    expect(() => registry.register({ name: 'a', description: 'again', inputSchema, handler: noop })).toThrow(
      'Tool already registered: a'
    );
    expect(registry.list()).toEqual([
      { name: 'b', description: 'B', inputSchema },
      { name: 'a', description: 'A', inputSchema, annotations: { readOnlyHint: true } }
    ]);
    expect(registry.unregister('b')).toBe(true);
    expect(registry.size).toBe(1);
  });
});

describe('compileUriTemplate', () => {
  it('captures one path segment per placeholder', () => {
    const { pattern, parameters } = compileUriTemplate('weather://{city}/forecast/{days:int}');
    expect(parameters).toEqual(['city', 'days']);
    expect(pattern.exec('weather://paris/forecast/3')?.groups).toEqual({ city: 'paris', days: '3' });
    expect(pattern.test('weather://paris/berlin/forecast/3')).toBe(false);
  });

  it('requires every placeholder to be filled', () => {
    const { pattern } = compileUriTemplate('data://location/{id}');
    expect(pattern.exec('data://location/london')?.groups).toEqual({ id: 'london' });
    expect(pattern.test('data://location')).toBe(false);
    expect(pattern.test('data://location/')).toBe(false);
  });

  it('escapes the literal parts', () => {
    const { pattern } = compileUriTemplate('file:///notes.{name}');
    expect(pattern.test('file:///notesXtodo')).toBe(false);
    expect(pattern.test('file:///notes.todo')).toBe(true);
  });

  it('rejects repeated parameter names', () => {
    expect(() => compileUriTemplate('x://{id}/{id}')).toThrow(MCPError);
  });
});

describe('ResourceRegistry', () => {
  const registry = new ResourceRegistry();
  registry.register({ uri: 'users://{id}/profile', name: 'Profile', description: 'A user profile', handler: noop });
  registry.register({ uri: 'users://me/profile', name: 'Me', description: 'Own profile', mimeType: 'application/json', handler: noop });

  it('prefers an exact URI over a template', () => {
    expect(registry.match('users://me/profile')?.resource.name).toBe('Me');
    expect(registry.match('users://42/profile')).toMatchObject({ params: { id: '42' } });
    expect(registry.match('users://42/settings')).toBeUndefined();
  });

  it('lists templates with derived arguments and fixed resources as they are', () => {
    expect(registry.list()).toEqual([
      {
        uriTemplate: 'users://{id}/profile',
        name: 'Profile',
        description: 'A user profile',
        arguments: [{ name: 'id', required: true }]
      },
      { uri: 'users://me/profile', name: 'Me', description: 'Own profile', mimeType: 'application/json' }
    ]);
  });
});

describe('PromptRegistry', () => {
  it('omits an empty argument list', () => {
    const registry = new PromptRegistry();
    registry.register({ name: 'greet', description: 'Say hello', arguments: [], handler: noop });
    expect(registry.list()).toEqual([{ name: 'greet', description: 'Say hello' }]);
  });
});

import { describe, it, expect } from 'vitest';
import {
  parseParameterList,
  substituteParameter,
  expandCommands,
  ParameterError,
} from './parameter-list.js';

describe('parseParameterList', () => {
  it('should tokenize the raw values', () => {
    const result = parseParameterList('threads', '1,2,4');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ name: 'threads', values: ['1', '2', '4'] });
    }
  });

  it('should honor escaped commas inside values', () => {
    const result = parseParameterList('msg', 'a\\,b,c');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.values).toEqual(['a,b', 'c']);
    }
  });

  it('should reject an empty name', () => {
    const result = parseParameterList('', '1,2');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ParameterError);
      expect(result.error.message).toBe('Parameter name must not be empty');
    }
  });

  it('should reject a name containing braces', () => {
    const result = parseParameterList('{x}', '1');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Parameter name must not contain braces: {x}');
    }
  });
});

describe('substituteParameter', () => {
  it('should replace every placeholder occurrence', () => {
    expect(substituteParameter('cp {f} {f}.bak', 'f', 'data.txt')).toBe('cp data.txt data.txt.bak');
  });

  it('should treat the name literally', () => {
    expect(substituteParameter('run {a.b} {axb}', 'a.b', '1')).toBe('run 1 {axb}');
  });

  it('should leave templates without the placeholder unchanged', () => {
    expect(substituteParameter('echo hi', 'n', '3')).toBe('echo hi');
  });
});

describe('expandCommands', () => {
  it('should produce one command per value in order', () => {
    const commands = expandCommands('sleep {t}', { name: 't', values: ['0.1', '0.2'] });

    expect(commands).toEqual([
      { command: 'sleep 0.1', parameter: { name: 't', value: '0.1' } },
      { command: 'sleep 0.2', parameter: { name: 't', value: '0.2' } },
    ]);
  });

  it('should keep empty values', () => {
    const commands = expandCommands('ls {dir}', { name: 'dir', values: ['', 'src'] });

    expect(commands.map((c) => c.command)).toEqual(['ls ', 'ls src']);
  });
});

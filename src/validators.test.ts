import { describe, it, expect } from 'vitest';
import {
  IssueDetailsArgsSchema,
  ListComponentsArgsSchema,
  ListIssuesArgsSchema,
  SprintIssuesArgsSchema,
  parseArgs,
} from './validators.js';
import { ValidationError } from './errors.js';

describe('parseArgs', () => {
  it('applies the default limit and drops blank text', () => {
    expect(parseArgs(ListIssuesArgsSchema, { project: '  ', search_text: ' login ' })).toEqual({
      project: undefined,
      issue_type: undefined,
      status: undefined,
      priority: undefined,
      search_text: 'login',
      components: undefined,
      version: undefined,
      created_days: undefined,
      updated_days: undefined,
      resolved_days: undefined,
      timeframe: undefined,
      limit: 50,
    });
  });

  it('coerces numeric strings', () => {
    const args = parseArgs(ListIssuesArgsSchema, { limit: '10', updated_days: '7' });
    expect(args.limit).toBe(10);
    expect(args.updated_days).toBe(7);
  });

  it('rejects numeric arguments of the wrong type', () => {
    expect(() => parseArgs(ListIssuesArgsSchema, { limit: true })).toThrow(
      new ValidationError('Invalid arguments: limit: Invalid input')
    );
    expect(() => parseArgs(ListIssuesArgsSchema, { created_days: [7] })).toThrow(
      new ValidationError('Invalid arguments: created_days: Invalid input')
    );
    expect(() => parseArgs(ListIssuesArgsSchema, { limit: '10abc' })).toThrow(
      /^Invalid arguments: limit: /
    );
  });

  it('treats a blank component string as not provided', () => {
    expect(parseArgs(ListIssuesArgsSchema, { components: '' }).components).toBeUndefined();
    expect(parseArgs(ListIssuesArgsSchema, { components: ' , ' }).components).toBeUndefined();
  });

  it('keeps an explicit empty component list', () => {
    expect(parseArgs(ListIssuesArgsSchema, { components: [] }).components).toEqual([]);
    expect(parseArgs(ListIssuesArgsSchema, { components: 'UI, API' }).components).toEqual([
      'UI',
      'API',
    ]);
  });

  it('treats undefined arguments as an empty object', () => {
    expect(parseArgs(ListIssuesArgsSchema, undefined).limit).toBe(50);
  });

  it('splits comma-separated key lists and drops empty entries', () => {
    expect(parseArgs(IssueDetailsArgsSchema, { issue_keys: 'SMQE-1, ,SMQE-2,' })).toEqual({
      issue_keys: ['SMQE-1', 'SMQE-2'],
    });
  });

  it('accepts Y/N and boolean flags', () => {
    expect(parseArgs(ListComponentsArgsSchema, { archived: 'Y', deleted: false })).toMatchObject({
      archived: true,
      deleted: false,
    });
  });

  it('names each offending argument', () => {
    expect(() => parseArgs(SprintIssuesArgsSchema, { sprint_name: ' ', limit: 5000 })).toThrow(
      new ValidationError(
        'Invalid arguments: sprint_name: sprint_name is required; limit: Number must be less than or equal to 1000'
      )
    );
  });

  it('rejects more than 500 issue keys', () => {
    const keys = Array.from({ length: 501 }, (_, i) => `SMQE-${i + 1}`);
    expect(() => parseArgs(IssueDetailsArgsSchema, { issue_keys: keys })).toThrow(
      /^Invalid arguments: issue_keys: /
    );
  });
});

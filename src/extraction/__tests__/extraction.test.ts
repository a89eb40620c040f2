import { describe, it, expect } from 'vitest';
import { buildExtractionPrompt, outputTemplate } from '../prompt.js';
import { parseModelJson } from '../response.js';
import { cleanValue, normalizeFields } from '../normalize.js';
import { MalformedResponseError } from '../../shared/errors.js';
import type { ExtractionProfile } from '../../config/types.js';

const profile: ExtractionProfile = {
  name: 'motor',
  fields: ['POLICY_NO', 'CUSTOMER_NAME', 'INSURANCE_COMPANY_NAME'],
  rules: '  POLICY_NO: value next to "Policy No".  \n',
  company: { field: 'INSURANCE_COMPANY_NAME', name: 'Example General Insurance', match: 'example' },
};

describe('outputTemplate', () => {
  it('lists every field with an empty value', () => {
    expect(JSON.parse(outputTemplate(profile))).toEqual({
      POLICY_NO: '',
      CUSTOMER_NAME: '',
      INSURANCE_COMPANY_NAME: '',
    });
  });
});

describe('buildExtractionPrompt', () => {
  it('puts rules, template and text in order', () => {
    const prompt = buildExtractionPrompt(profile, 'Policy No: P-1');
    const sections = prompt.split('\n\n');

    expect(sections[0]).toBe('You are an expert at extracting structured data from documents.');
    expect(sections[1]).toBe('POLICY_NO: value next to "Policy No".');
    expect(sections[2]!.startsWith('TASK:\n')).toBe(true);
    expect(sections[3]).toBe(`REQUIRED OUTPUT FORMAT:\n${outputTemplate(profile)}`);
    expect(sections[4]).toBe('DOCUMENT TEXT TO EXTRACT FROM:\nPolicy No: P-1');
    expect(prompt.endsWith('properly quoted and escaped.\n')).toBe(true);
  });

  it('leaves out the rules section when there are none', () => {
    const prompt = buildExtractionPrompt({ ...profile, rules: '   ' }, 'text');
    expect(prompt.split('\n\n')[1]!.startsWith('TASK:')).toBe(true);
  });
});

describe('parseModelJson', () => {
  it('parses a bare object', () => {
    expect(parseModelJson('{"POLICY_NO":"P-1"}')).toEqual({ POLICY_NO: 'P-1' });
  });

  it('finds the object inside a markdown fence', () => {
    const text = 'Here you go:\n```json\n{"POLICY_NO": "P-1", "CC": 149}\n```';
    expect(parseModelJson(text)).toEqual({ POLICY_NO: 'P-1', CC: 149 });
  });

  it('rejects text without an object', () => {
    expect(() => parseModelJson('I could not read the document.')).toThrow('No JSON object found in response');
  });

  it('rejects broken JSON', () => {
    let caught: unknown;
    try {
      parseModelJson('{"POLICY_NO": "P-1",}');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MalformedResponseError);
    expect(caught instanceof Error && caught.message.startsWith('Failed to parse JSON: ')).toBe(true);
  });
});

describe('cleanValue', () => {
  it('turns missing values into empty strings', () => {
    expect(cleanValue(null)).toBe('');
    expect(cleanValue(undefined)).toBe('');
  });

  it('stringifies numbers and booleans', () => {
    expect(cleanValue(149)).toBe('149');
    expect(cleanValue(false)).toBe('false');
  });

  it('collapses whitespace', () => {
    expect(cleanValue('  12,  Main\n Road\t ')).toBe('12, Main Road');
  });

  it('blanks placeholder values', () => {
    for (const placeholder of ['None', 'null', 'N/A', ' na ']) {
      expect(cleanValue(placeholder)).toBe('');
    }
  });

  it('serializes nested values', () => {
    expect(cleanValue({ a: 1 })).toBe('{"a":1}');
  });
});

describe('normalizeFields', () => {
  it('fills missing fields and keeps extra ones', () => {
    const payload = normalizeFields(
      { POLICY_NO: ' P-1 ', EXTRA: 'N/A', INSURANCE_COMPANY_NAME: 'Example General Insurance Co.' },
      profile,
    );

    expect(payload).toEqual({
      POLICY_NO: 'P-1',
      CUSTOMER_NAME: '',
      INSURANCE_COMPANY_NAME: 'Example General Insurance Co.',
      EXTRA: '',
    });
    expect(Object.keys(payload)).toEqual(['POLICY_NO', 'CUSTOMER_NAME', 'INSURANCE_COMPANY_NAME', 'EXTRA']);
  });

  it('corrects a company name that does not match the profile', () => {
    const payload = normalizeFields({ INSURANCE_COMPANY_NAME: 'Some Broker Ltd' }, profile);
    expect(payload['INSURANCE_COMPANY_NAME']).toBe('Example General Insurance');
  });

  it('leaves the company field alone without a company in the profile', () => {
    const { company: _company, ...plain } = profile;
    const payload = normalizeFields({ INSURANCE_COMPANY_NAME: 'Some Broker Ltd' }, plain);
    expect(payload['INSURANCE_COMPANY_NAME']).toBe('Some Broker Ltd');
  });
});

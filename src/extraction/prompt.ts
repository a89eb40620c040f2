/**
 * Prompt construction for field extraction.
 * The profile supplies the field list and the document-specific rules;
 * the surrounding instructions are the same for every profile.
 */

import type { ExtractionProfile } from '../config/types.js';

/** Empty-valued JSON object with every profile field, shown to the model as the output format. */
export function outputTemplate(profile: ExtractionProfile): string {
  const template: Record<string, string> = {};
  for (const field of profile.fields) {
    template[field] = '';
  }
  return JSON.stringify(template, null, 2);
}

/** Build the full extraction prompt for one document's text. */
export function buildExtractionPrompt(profile: ExtractionProfile, documentText: string): string {
  const sections = ['You are an expert at extracting structured data from documents.'];

  const rules = profile.rules.trim();
  if (rules !== '') {
    sections.push(rules);
  }

  sections.push(
    [
      'TASK:',
      'Extract all fields from the document text below and return ONLY a valid JSON object with the exact structure shown.',
      'Do NOT include any explanations, markdown formatting, or additional text - ONLY the JSON object.',
      'If a field is not found, use an empty string "".',
    ].join('\n'),
    `REQUIRED OUTPUT FORMAT:\n${outputTemplate(profile)}`,
    `DOCUMENT TEXT TO EXTRACT FROM:\n${documentText}`,
    'Return ONLY the JSON object with all extracted fields. Ensure all string values are properly quoted and escaped.',
  );

  return sections.join('\n\n') + '\n';
}

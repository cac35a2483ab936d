import type { OutputFormat } from './extraction.types.js';

export const EXTRACTION_SYSTEM_PROMPT =
  'You are a data extraction assistant. You read the user\'s text and instructions and return ' +
  'only the requested data in the requested machine-readable format. You never add explanations, ' +
  'greetings or Markdown.';

const FORMAT_INSTRUCTIONS: Record<OutputFormat, string> = {
  json: [
    'Please provide the output strictly in JSON format.',
    'Respond with a single JSON object and nothing else: no explanatory text before or after it,',
    'no Markdown code fences, no comments and no trailing commas.',
  ].join('\n'),
  csv: [
    'Please provide the output strictly in CSV format.',
    'Respond with a comma-separated table and nothing else: the first line is a header row of',
    'unique column names, every following line is one record with the same number of fields.',
    'Wrap fields that contain commas, quotes or line breaks in double quotes.',
    'Do not add explanatory text before or after the table and do not use Markdown code fences.',
  ].join('\n'),
};

export function formatInstruction(format: OutputFormat): string {
  return FORMAT_INSTRUCTIONS[format];
}

export function composePrompt(rawPrompt: string, format: OutputFormat): string {
  return `${rawPrompt}\n\n${formatInstruction(format)}`;
}

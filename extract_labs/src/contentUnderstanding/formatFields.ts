import type { AnalyzedContent, ContentField } from './client';

const MISSING = '(none)';

function orMissing(value: string | number | boolean | undefined): string {
  return value === undefined ? MISSING : String(value);
}

/**
 * Render a field's typed value. Returns undefined for types we do not know
 * how to print.
 */
export function formatFieldValue(field: ContentField): string | undefined {
  switch (field.type) {
    case 'string':
      return orMissing(field.valueString);
    case 'number':
      return orMissing(field.valueNumber);
    case 'integer':
      return orMissing(field.valueInteger);
    case 'date':
      return orMissing(field.valueDate);
    case 'time':
      return orMissing(field.valueTime);
    case 'boolean':
      return orMissing(field.valueBoolean);
    case 'array': {
      if (!field.valueArray) return MISSING;
      const items = field.valueArray.map((item) => formatFieldValue(item) ?? MISSING);
      return `[${items.join(', ')}]`;
    }
    case 'object': {
      if (!field.valueObject) return MISSING;
      const members = Object.entries(field.valueObject).map(
        ([name, member]) => `${name}: ${formatFieldValue(member) ?? MISSING}`,
      );
      return `{${members.join(', ')}}`;
    }
    default:
      return undefined;
  }
}

export function formatContentField(name: string, field: ContentField): string | undefined {
  const value = formatFieldValue(field);
  if (value === undefined) return undefined;
  return `${name}: ${value}`;
}

export function formatContents(contents: AnalyzedContent[]): string[] {
  const lines: string[] = [];
  for (const content of contents) {
    if (!content.fields) continue;
    for (const [name, field] of Object.entries(content.fields)) {
      const line = formatContentField(name, field);
      if (line !== undefined) lines.push(line);
    }
  }
  return lines;
}

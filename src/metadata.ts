import matter from 'gray-matter';

export interface WorkItemMetadata {
  workItem?: string;
  field?: string;
  baseUrl?: string;
}

export interface ParsedMarkdown {
  content: string;
  metadata: WorkItemMetadata;
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number') return String(value);
  return undefined;
}

export function parseMarkdownFile(content: string): ParsedMarkdown {
  const { data, content: markdownContent } = matter(content);

  // Keys may sit at the top level or under a `jira:` block
  const nested: Record<string, unknown> =
    typeof data.jira === 'object' && data.jira !== null ? data.jira : {};

  const metadata: WorkItemMetadata = {
    workItem: optionalString(nested.workItem ?? data.workItem ?? data.issue),
    field: optionalString(nested.field ?? data.field),
    baseUrl: optionalString(nested.baseUrl ?? data.baseUrl),
  };

  return {
    content: markdownContent,
    metadata,
  };
}

/**
 * Prefix Markdown with YAML front matter naming where it came from.
 * Undefined keys are left out.
 */
export function stringifyMarkdownFile(markdown: string, metadata: WorkItemMetadata): string {
  const data: Record<string, string> = {};
  if (metadata.workItem) data.workItem = metadata.workItem;
  if (metadata.field) data.field = metadata.field;
  if (metadata.baseUrl) data.baseUrl = metadata.baseUrl;

  if (Object.keys(data).length === 0) {
    return markdown;
  }
  return matter.stringify(markdown, data);
}

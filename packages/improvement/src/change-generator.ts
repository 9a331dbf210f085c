import { randomUUID } from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { affectedTools, createLogger, errorMessage } from '@selfwright/core';
import type { Improvement, ImprovementOpportunity, IReasoningService } from '@selfwright/core';
import { GENERATED_IMPROVEMENT_JSON_SCHEMA, GeneratedImprovementSchema } from './generation-schema.js';
import type { GeneratedImprovement } from './generation-schema.js';
import { isMissingPathError } from './utils/file-io.js';
import { extractJson } from './utils/json-extract.js';

const log = createLogger('ChangeGenerator');

export interface GeneratorOptions {
  /** Project root all context paths are relative to */
  projectRoot: string;
  /** Directory holding one sub-directory per tool plugin */
  pluginsDir: string;
  /** Files always included as context */
  baseContextFiles: string[];
  /** Each excerpt is cut to this many characters */
  maxExcerptChars: number;
  /** Plugin modules of at most this many affected tools are included */
  maxContextTools: number;
}

export const DEFAULT_GENERATOR_OPTIONS: Omit<GeneratorOptions, 'projectRoot'> = {
  pluginsDir: 'src/plugins',
  baseContextFiles: ['src/agent.ts'],
  maxExcerptChars: 2000,
  maxContextTools: 3,
};

const PLUGIN_ENTRY_FILES = ['index.ts', 'plugin.ts', 'index.js', 'main.ts'];

const SYSTEM_PROMPT = [
  'You write source changes for a TypeScript agent that improves its own tools.',
  'Reply with exactly one JSON object matching the response schema and nothing else.',
  'Paths are relative to the project root. "modify" and "create" carry the full new file content.',
].join('\n');

export type ParseResult = { ok: true; value: GeneratedImprovement } | { ok: false; error: string };

/** Extract and schema-check one generated improvement from raw model text */
export function parseGeneratedImprovement(raw: string): ParseResult {
  if (!raw.trim()) return { ok: false, error: 'empty response' };

  const json = extractJson(raw);
  if (json === null) return { ok: false, error: 'no JSON object found in response' };

  const parsed = GeneratedImprovementSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    return { ok: false, error: `schema violation: ${issues.join(', ')}` };
  }
  return { ok: true, value: parsed.data };
}

/**
 * Turns one opportunity into a proposed Improvement with a single structured
 * request to the reasoning service. Returns null on any failure; it does not
 * retry.
 */
export class ChangeGenerator {
  private readonly options: GeneratorOptions;

  constructor(
    private readonly reasoning: IReasoningService,
    options: Partial<GeneratorOptions> & { projectRoot: string },
  ) {
    this.options = { ...DEFAULT_GENERATOR_OPTIONS, ...options };
  }

  async generate(opportunity: ImprovementOpportunity): Promise<Improvement | null> {
    let raw: string;
    try {
      const context = await this.buildContext(opportunity);
      raw = await this.reasoning.generate({
        system: SYSTEM_PROMPT,
        prompt: this.buildPrompt(opportunity, context),
        responseSchema: GENERATED_IMPROVEMENT_JSON_SCHEMA,
      });
    } catch (error) {
      log.error(`[generating] Reasoning request failed: ${errorMessage(error)}`, undefined, opportunity.id);
      return null;
    }

    const parsed = parseGeneratedImprovement(raw);
    if (!parsed.ok) {
      log.error(`[generating] Unusable response: ${parsed.error}`, undefined, opportunity.id);
      return null;
    }

    const { title, description, changes, verificationScript } = parsed.value;
    log.info(`[generating] Proposed "${title}" with ${changes.length} change(s)`, undefined, opportunity.id);
    return {
      id: `imp-${randomUUID().slice(0, 8)}`,
      opportunityId: opportunity.id,
      title,
      description,
      changes: changes.map((c) => ({ ...c })),
      verificationScript: verificationScript?.trim() ? verificationScript : undefined,
    };
  }

  /** Bounded source excerpts: base files plus the plugins of affected tools */
  async buildContext(opportunity: ImprovementOpportunity): Promise<string> {
    const paths = [...this.options.baseContextFiles];

    const tools = affectedTools(opportunity).slice(0, this.options.maxContextTools);
    if (tools.length > 0) {
      const pluginDirs = await this.listPluginDirs();
      for (const tool of tools) {
        const lower = tool.toLowerCase();
        const dir = pluginDirs.find((d) => lower.includes(d.toLowerCase()));
        if (!dir) continue;
        const entry = await this.findEntryFile(join(this.options.pluginsDir, dir));
        if (entry && !paths.includes(entry)) paths.push(entry);
      }
    }

    const excerpts: string[] = [];
    for (const path of paths) {
      const excerpt = await this.readExcerpt(path);
      if (excerpt) excerpts.push(excerpt);
    }
    return excerpts.join('\n\n');
  }

  buildPrompt(opportunity: ImprovementOpportunity, context: string): string {
    return [
      `# Improvement opportunity: ${opportunity.description}`,
      '',
      `Type: ${opportunity.type}`,
      `Priority: ${opportunity.priority}/10`,
      '',
      '## Evidence',
      ...this.describeEvidence(opportunity),
      '',
      '## Relevant source',
      context || '(no source context available)',
      '',
      '## Constraints',
      '- Keep changes small and focused on this opportunity',
      '- Only touch files under the project root, using relative paths',
      '- Every TypeScript or JSON file you write must parse',
      '- Optionally include `verificationScript`: a Node.js ESM script that exits non-zero if the change is wrong.',
      '  It runs without network access in a directory holding the changed files at their relative paths.',
    ].join('\n');
  }

  private describeEvidence(opportunity: ImprovementOpportunity): string[] {
    switch (opportunity.type) {
      case 'fix-failure':
        return [
          `- Error: ${opportunity.context.errorMessage}`,
          `- Occurrences: ${opportunity.context.occurrenceCount}`,
          `- Tools involved: ${opportunity.context.toolsInvolved.join(', ') || 'none'}`,
          ...opportunity.context.sampleRequests.map((r) => `- Sample request: ${r}`),
        ];
      case 'optimize-speed':
        return [
          `- Tool: ${opportunity.context.toolName}`,
          `- Average duration of slow runs: ${opportunity.context.avgDurationMs}ms`,
          `- Slow runs: ${opportunity.context.occurrenceCount}`,
        ];
      case 'automate-pattern':
        return [
          `- Sequence: ${opportunity.context.toolSequence.join(' -> ')}`,
          `- Repetitions: ${opportunity.context.occurrenceCount}`,
        ];
      case 'new-capability':
        return [
          `- Unsupported requests: ${opportunity.context.requestCount}`,
          ...opportunity.context.sampleRequests.map((r) => `- Sample request: ${r}`),
        ];
    }
  }

  private async listPluginDirs(): Promise<string[]> {
    try {
      const entries = await readdir(join(this.options.projectRoot, this.options.pluginsDir), { withFileTypes: true });
      return entries.filter((e) => e.isDirectory()).map((e) => e.name);
    } catch (error) {
      if (isMissingPathError(error)) return [];
      throw error;
    }
  }

  private async findEntryFile(dir: string): Promise<string | null> {
    for (const name of PLUGIN_ENTRY_FILES) {
      const candidate = join(dir, name);
      if ((await this.readSource(candidate)) !== null) return candidate;
    }
    return null;
  }

  private async readExcerpt(path: string): Promise<string | null> {
    const source = await this.readSource(path);
    if (source === null) return null;
    const max = this.options.maxExcerptChars;
    const body = source.length > max ? `${source.slice(0, max)}\n// ... truncated` : source;
    return `### ${path}\n\`\`\`\n${body}\n\`\`\``;
  }

  private async readSource(path: string): Promise<string | null> {
    try {
      return await readFile(join(this.options.projectRoot, path), 'utf-8');
    } catch (error) {
      if (isMissingPathError(error) || (error instanceof Error && 'code' in error && error.code === 'EISDIR')) {
        return null;
      }
      throw error;
    }
  }
}

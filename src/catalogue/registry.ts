import { CatalogueError } from '../transpiler/errors';
import type { LanguageDefinition } from '../transpiler/types';
import { discoverFiles, loadLanguageFile, LEXER_FILE_PATTERN } from './loader';

export interface LoadFailure {
  file: string;
  error: Error;
}

/** Loaded languages, looked up by display name without regard to case. */
export class LanguageRegistry {
  private readonly byName = new Map<string, LanguageDefinition>();
  // First language to claim an alias keeps it.
  private readonly byAlias = new Map<string, LanguageDefinition>();

  constructor(languages: Iterable<LanguageDefinition> = []) {
    for (const language of languages) this.add(language);
  }

  add(language: LanguageDefinition): void {
    const key = language.name.toLowerCase();
    const existing = this.byName.get(key);
    if (existing) {
      throw new CatalogueError(language.sourceFile ?? language.name, [
        `language '${language.name}' is already defined${existing.sourceFile ? ` in ${existing.sourceFile}` : ''}`,
      ]);
    }
    this.byName.set(key, language);
    for (const alias of language.aliases) {
      const aliasKey = alias.toLowerCase();
      if (!this.byAlias.has(aliasKey)) this.byAlias.set(aliasKey, language);
    }
  }

  get(name: string): LanguageDefinition | undefined {
    return this.byName.get(name.toLowerCase());
  }

  has(name: string): boolean {
    return this.byName.has(name.toLowerCase());
  }

  get size(): number {
    return this.byName.size;
  }

  /** In load order. */
  list(): LanguageDefinition[] {
    return [...this.byName.values()];
  }

  readonly lookup = (name: string): LanguageDefinition | undefined => this.get(name);

  /** By display name, else by alias. */
  resolve(name: string): LanguageDefinition | undefined {
    return this.get(name) ?? this.byAlias.get(name.toLowerCase());
  }

  /**
   * Splits requested names or aliases into known languages and names nothing
   * answers to. A language asked for twice is selected once.
   */
  select(names: readonly string[]): { languages: LanguageDefinition[]; missing: string[] } {
    const languages: LanguageDefinition[] = [];
    const missing: string[] = [];
    for (const name of names) {
      const language = this.resolve(name);
      if (!language) missing.push(name);
      else if (!languages.includes(language)) languages.push(language);
    }
    return { languages, missing };
  }

  /**
   * Loads every `*.lexer.json` under `dir`. A file that fails to load is
   * reported and skipped; the rest still register.
   */
  static async load(
    dir: string,
    pattern: string = LEXER_FILE_PATTERN
  ): Promise<{ registry: LanguageRegistry; failures: LoadFailure[] }> {
    const registry = new LanguageRegistry();
    const failures: LoadFailure[] = [];
    for (const file of await discoverFiles(dir, pattern)) {
      try {
        registry.add(await loadLanguageFile(file));
      } catch (error: unknown) {
        failures.push({ file, error: error instanceof Error ? error : new Error(String(error)) });
      }
    }
    return { registry, failures };
  }
}

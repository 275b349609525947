import { promises as fs } from 'fs';
import { StoreCorruptedError, atomicWrite, tryParseJson } from '@northstar/shared';
import { DocumentLifecycleStore } from './store';
import { LifecycleDocumentSchema, emptyDocument, type LifecycleDocument } from './schema';

/**
 * Lifecycle store persisted as one JSON document. The file is read once and
 * rewritten atomically after every mutation; a missing file is an empty store.
 */
export class JsonFileLifecycleStore extends DocumentLifecycleStore {
  private cache: LifecycleDocument | null = null;

  constructor(private readonly filePath: string) {
    super();
  }

  protected async read(): Promise<LifecycleDocument> {
    if (!this.cache) {
      this.cache = await this.load();
    }
    return this.cache;
  }

  protected async write(doc: LifecycleDocument): Promise<void> {
    await atomicWrite(this.filePath, JSON.stringify(doc, null, 2) + '\n');
    this.cache = doc;
  }

  private async load(): Promise<LifecycleDocument> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return emptyDocument();
      }
      throw error;
    }

    const parsed = tryParseJson(raw);
    if (!parsed.ok) {
      throw new StoreCorruptedError(`Lifecycle store ${this.filePath} is not valid JSON: ${parsed.error}`);
    }
    const result = LifecycleDocumentSchema.safeParse(parsed.value);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
      throw new StoreCorruptedError(`Lifecycle store ${this.filePath} failed validation:\n${issues}`);
    }
    return result.data;
  }
}

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';

const CredentialEntrySchema = z.object({
  owner: z.string(),
  envVar: z.string(),
  accessLevel: z.string().default('Unknown'),
  scopes: z.array(z.string()).default([]),
  lastValidated: z.string().nullable().default(null),
  keyType: z.string().default('user'),
});
export type CredentialEntry = z.infer<typeof CredentialEntrySchema>;

const CredentialDocumentSchema = z.object({
  keys: z.record(CredentialEntrySchema).default({}),
});
export type CredentialDocument = z.infer<typeof CredentialDocumentSchema>;

export const emptyDocument = (): CredentialDocument => ({ keys: {} });

export class CredentialMetadataError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'CredentialMetadataError';
  }
}

/** Rejects the whole document when any entry is invalid, so a later save cannot drop entries. */
export const parseCredentialDocument = (value: unknown, path: string): CredentialDocument => {
  const parsed = CredentialDocumentSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new CredentialMetadataError(`Invalid credential metadata in ${path}`, path, issues);
  }
  return parsed.data;
};

/**
 * Keyed document holding credential metadata. Secrets never pass through it;
 * entries only name the environment variable a secret lives in.
 */
export interface CredentialMetadataStore {
  load(): Promise<CredentialDocument>;
  save(document: CredentialDocument): Promise<void>;
}

const isMissingFile = (err: unknown) =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';

export class JsonFileMetadataStore implements CredentialMetadataStore {
  constructor(private readonly path: string) {}

  async load(): Promise<CredentialDocument> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return emptyDocument();
      throw err;
    }
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (err) {
      throw new CredentialMetadataError(
        `Credential metadata in ${this.path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        this.path
      );
    }
    return parseCredentialDocument(value, this.path);
  }

  async save(document: CredentialDocument): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
  }
}

export class InMemoryMetadataStore implements CredentialMetadataStore {
  private document: CredentialDocument;

  constructor(initial: CredentialDocument = emptyDocument()) {
    this.document = structuredClone(initial);
  }

  async load(): Promise<CredentialDocument> {
    return structuredClone(this.document);
  }

  async save(document: CredentialDocument): Promise<void> {
    this.document = structuredClone(document);
  }
}

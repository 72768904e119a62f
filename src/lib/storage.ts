/**
 * Storage system for the query optimizer
 *
 * Provides versioned persistence for run results and single-file
 * persistence for caches (embeddings, dataset splits)
 */
import * as fsPromises from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { errorMessage } from './errors';
import { debug } from './utils/debug';

/**
 * Kinds of artifacts kept by the store. Each maps to a `<type>s/` directory.
 */
export type ArtifactType = 'run' | 'embedding' | 'dataset';

const LatestPointerSchema = z.object({ version: z.string().min(1) });

/**
 * Metadata attached to every versioned artifact
 */
export interface ArtifactMetadata {
  version: string;
  timestamp: string;
  type: ArtifactType;
  name: string;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Store class for managing artifacts on disk
 */
export class Store {
  private baseDir: string;
  private idCounter: number = 0;

  /**
   * Create a new Store instance
   * @param storePath Directory the store writes under
   */
  constructor(storePath: string) {
    this.baseDir = storePath;
  }

  /**
   * Generate a unique ID with timestamp for versioning.
   * IDs sort by creation time: base-36 timestamp, then a counter.
   */
  generateId(): string {
    const timestamp = Date.now().toString(36);

    // Counter keeps IDs unique even for rapid calls
    this.idCounter++;

    const random = Math.random().toString(36).substring(2, 6);

    return `${timestamp}-${this.idCounter}-${random}`;
  }

  private typeDir(type: ArtifactType): string {
    return path.join(this.baseDir, type + 's');
  }

  private async ensureDir(dirPath: string): Promise<void> {
    debug('persistence', `Ensuring directory exists: ${dirPath}`);
    try {
      await fsPromises.mkdir(dirPath, { recursive: true });
    } catch (error) {
      throw new Error(`Failed to create directory ${dirPath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async writeJson(filePath: string, data: unknown): Promise<void> {
    // Write to a sibling temp file first so readers never see a partial file
    const tmpPath = `${filePath}.${process.pid}.${this.generateId()}.tmp`;
    await fsPromises.writeFile(tmpPath, JSON.stringify(data, null, 2));
    await fsPromises.rename(tmpPath, filePath);
  }

  private async readJson(filePath: string): Promise<unknown> {
    const content = await fsPromises.readFile(filePath, 'utf-8');
    return JSON.parse(content);
  }

  /* ------------------------------------------------------------------ */
  /* versioned artifacts                                                */
  /* ------------------------------------------------------------------ */

  /**
   * Save a new version of an artifact and point `latest` at it
   * @param type Type of artifact
   * @param name Name of the artifact
   * @param data JSON-serialisable payload; stored with a `_metadata` field
   * @returns The version ID of the saved artifact
   */
  async save(type: ArtifactType, name: string, data: Record<string, unknown>): Promise<string> {
    if (!name) {
      throw new Error('Artifact name must be a non-empty string');
    }

    debug('persistence', `Saving ${type} with name: ${name}`);

    const itemDir = path.join(this.typeDir(type), name);
    await this.ensureDir(itemDir);

    const versionId = this.generateId();
    const metadata: ArtifactMetadata = {
      version: versionId,
      timestamp: new Date().toISOString(),
      type,
      name,
    };

    const versionPath = path.join(itemDir, `${versionId}.json`);
    try {
      await this.writeJson(versionPath, { ...data, _metadata: metadata });
      await this.writeJson(path.join(itemDir, 'latest.json'), { version: versionId });
    } catch (error) {
      debug('persistence', `Error saving ${type} "${name}": ${errorMessage(error)}`);
      throw new Error(`Failed to save ${type} "${name}": ${errorMessage(error)}`, { cause: error });
    }

    debug('persistence', `Saved ${type} "${name}" version "${versionId}" to ${versionPath}`);
    return versionId;
  }

  /**
   * Load the latest version of an artifact, or a specific version if provided
   */
  async load(type: ArtifactType, name: string, version?: string): Promise<unknown> {
    if (version) {
      return this.loadVersion(type, name, version);
    }

    const latestPath = path.join(this.typeDir(type), name, 'latest.json');
    debug('persistence', `Loading latest ${type} "${name}" via ${latestPath}`);

    let pointer: z.infer<typeof LatestPointerSchema>;
    try {
      pointer = LatestPointerSchema.parse(await this.readJson(latestPath));
    } catch (error) {
      if (isNotFound(error)) {
        throw new Error(`${type} "${name}" not found`, { cause: error });
      }
      throw new Error(`Failed to read latest pointer for ${type} "${name}": ${errorMessage(error)}`, { cause: error });
    }

    return this.loadVersion(type, name, pointer.version);
  }

  /**
   * Load a specific version of an artifact
   */
  async loadVersion(type: ArtifactType, name: string, version: string): Promise<unknown> {
    const versionPath = path.join(this.typeDir(type), name, `${version}.json`);
    debug('persistence', `Loading ${type} "${name}" version "${version}"`);

    try {
      return await this.readJson(versionPath);
    } catch (error) {
      if (isNotFound(error)) {
        throw new Error(`Version "${version}" of ${type} "${name}" not found`, { cause: error });
      }
      throw new Error(`Failed to load ${type} "${name}" version "${version}": ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * List all versions of an artifact, newest first
   */
  async listVersions(type: ArtifactType, name: string): Promise<string[]> {
    const itemDir = path.join(this.typeDir(type), name);

    try {
      const files = await fsPromises.readdir(itemDir);
      return files
        .filter(file => file !== 'latest.json' && file.endsWith('.json'))
        .map(file => file.replace(/\.json$/, ''))
        .sort((a, b) => {
          const [timestampA, counterA] = a.split('-');
          const [timestampB, counterB] = b.split('-');

          if (timestampA === timestampB) {
            return parseInt(counterB, 10) - parseInt(counterA, 10);
          }
          return parseInt(timestampB, 36) - parseInt(timestampA, 36);
        });
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw new Error(`Failed to list versions for ${type} "${name}": ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * List the names of all versioned artifacts of a type
   */
  async list(type: ArtifactType): Promise<string[]> {
    try {
      const entries = await fsPromises.readdir(this.typeDir(type), { withFileTypes: true });
      return entries.filter(entry => entry.isDirectory()).map(entry => entry.name).sort();
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw new Error(`Failed to list ${type}s: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Delete an artifact and all its versions
   * @returns True if deleted, false if it did not exist
   */
  async delete(type: ArtifactType, name: string): Promise<boolean> {
    const itemDir = path.join(this.typeDir(type), name);

    try {
      await fsPromises.access(itemDir);
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }

    await fsPromises.rm(itemDir, { recursive: true, force: true });
    return true;
  }

  /* ------------------------------------------------------------------ */
  /* single-file artifacts                                              */
  /* ------------------------------------------------------------------ */

  /**
   * Write (or overwrite) an unversioned artifact
   */
  async put(type: ArtifactType, name: string, data: unknown): Promise<string> {
    const dir = this.typeDir(type);
    await this.ensureDir(dir);
    const filePath = path.join(dir, `${name}.json`);
    await this.writeJson(filePath, data);
    debug('persistence', `Wrote ${type} "${name}" to ${filePath}`);
    return filePath;
  }

  /**
   * Read an unversioned artifact
   * @returns The parsed content, or undefined when it does not exist
   */
  async get(type: ArtifactType, name: string): Promise<unknown> {
    const filePath = path.join(this.typeDir(type), `${name}.json`);
    try {
      return await this.readJson(filePath);
    } catch (error) {
      if (isNotFound(error)) {
        debug('persistence', `No ${type} "${name}" at ${filePath}`);
        return undefined;
      }
      throw new Error(`Failed to read ${type} "${name}": ${errorMessage(error)}`, { cause: error });
    }
  }
}

import { randomBytes } from 'node:crypto';
import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { z } from 'zod';
import {
  ConflictError,
  NotFoundError,
  StorageError,
  encodeUnix,
  errorMessage,
} from '@threadline/sdk';

export type EntitySchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function errnoCode(error: unknown): string | undefined {
  return isRecord(error) && typeof error.code === 'string' ? error.code : undefined;
}

/** Dates are persisted as unix seconds, the same as the relational columns. */
function dateReplacer(this: unknown, key: string, value: unknown): unknown {
  const raw = isRecord(this) ? this[key] : value;
  return raw instanceof Date ? encodeUnix(raw) : value;
}

const PATH_SEGMENT = /^[A-Za-z0-9_-]{1,128}$/;

/** Ids and workspace ids name files and directories, so they may not carry separators or dots. */
export function isPathSegment(value: string): boolean {
  return PATH_SEGMENT.test(value);
}

/** A segment that cannot name a stored entity refers to nothing. */
export function pathSegment(kind: string, value: string): string {
  if (!isPathSegment(value)) throw NotFoundError.forResource(kind, value);
  return value;
}

export function serializeEntity(entity: unknown, space?: number): string {
  return JSON.stringify(entity, dateReplacer, space);
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return false;
    throw new StorageError(`Failed to stat ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

/** Names of subdirectories, or an empty list when `dir` does not exist. */
export async function listDirectories(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return [];
    throw new StorageError(`Failed to list ${dir}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * One JSON document per entity, `<dir>/<id>.json`. Creation is exclusive
 * (`wx`); updates replace the file through a rename, last writer wins.
 */
export class JsonFileStore<T extends { id: string }> {
  constructor(
    private readonly schema: EntitySchema<T>,
    private readonly kind: string
  ) {}

  pathFor(dir: string, id: string): string {
    return join(dir, `${pathSegment(this.kind, id)}.json`);
  }

  async create(dir: string, entity: T): Promise<T> {
    const path = this.pathFor(dir, entity.id);
    try {
      await mkdir(dir, { recursive: true });
      await writeFile(path, serializeEntity(entity, 2), { flag: 'wx' });
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') {
        throw new ConflictError(`${this.kind} with id '${entity.id}' already exists`, { cause: error });
      }
      throw new StorageError(`Failed to create ${this.kind} ${entity.id}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return entity;
  }

  async read(dir: string, id: string): Promise<T> {
    const entity = await this.readIfExists(dir, id);
    if (!entity) throw NotFoundError.forResource(this.kind, id);
    return entity;
  }

  async readIfExists(dir: string, id: string): Promise<T | undefined> {
    if (!isPathSegment(id)) return undefined;
    let raw: string;
    try {
      raw = await readFile(this.pathFor(dir, id), 'utf8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return undefined;
      throw new StorageError(`Failed to read ${this.kind} ${id}: ${errorMessage(error)}`, { cause: error });
    }
    return this.parse(raw, id);
  }

  private parse(raw: string, id: string): T {
    try {
      return this.schema.parse(JSON.parse(raw));
    } catch (error) {
      throw new StorageError(`Corrupt ${this.kind} record ${id}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async write(dir: string, entity: T): Promise<T> {
    const path = this.pathFor(dir, entity.id);
    if (!(await pathExists(path))) throw NotFoundError.forResource(this.kind, entity.id);
    const temp = `${path}.${randomBytes(4).toString('hex')}.tmp`;
    try {
      await writeFile(temp, serializeEntity(entity, 2));
      await rename(temp, path);
    } catch (error) {
      await rm(temp, { force: true });
      throw new StorageError(`Failed to update ${this.kind} ${entity.id}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return entity;
  }

  async remove(dir: string, id: string): Promise<void> {
    const path = this.pathFor(dir, id);
    try {
      await rm(path);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') throw NotFoundError.forResource(this.kind, id);
      throw new StorageError(`Failed to delete ${this.kind} ${id}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /** All entities in `dir`, ascending by id. */
  async list(dir: string): Promise<T[]> {
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return [];
      throw new StorageError(`Failed to list ${this.kind} records: ${errorMessage(error)}`, { cause: error });
    }
    const ids = names
      .filter((name) => name.endsWith('.json'))
      .map((name) => name.slice(0, -'.json'.length))
      .sort();
    const entities: T[] = [];
    for (const id of ids) {
      const entity = await this.readIfExists(dir, id);
      if (entity) entities.push(entity);
    }
    return entities;
  }
}

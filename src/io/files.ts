import * as fs from 'fs';
import * as path from 'path';
import JSONbig from 'json-bigint';
import { z } from 'zod';
import {
    createFileNotFoundError,
    createInvalidInputError,
    createJsonDecodeError,
    createReadError,
} from '../types/errors.js';

export const InstanceCatalogSchema = z
    .record(z.array(z.string()))
    .describe('{ "<TypeName>": ["<label>", ...] }');

export const GraphDocumentSchema = z
    .record(z.array(z.string()))
    .describe('{ "(SubjType,pred,ObjType)": ["(subj,pred,obj)", ...] }');

export const CardinalityConfigSchema = z
    .object({
        uniqueObject: z.array(z.string()).optional(),
        uniqueSubject: z.array(z.string()).optional(),
    })
    .strict()
    .describe('{ "uniqueObject": ["(S,p,O)", ...], "uniqueSubject": [...] }');

export const JSON_INDENT = 4;

const BigJSON = JSONbig({ useNativeBigInt: true });

/**
 * Pretty-print a document with a trailing newline. bigint values are written
 * as bare integer literals.
 */
export function stringifyJson(value: unknown): string {
    return BigJSON.stringify(value, undefined, JSON_INDENT) + '\n';
}

export function readTextFile(filePath: string, role: string = 'Input'): string {
    if (!fs.existsSync(filePath)) {
        throw createFileNotFoundError(filePath, role);
    }
    try {
        return fs.readFileSync(filePath, 'utf-8');
    } catch (e) {
        throw createReadError(filePath, e instanceof Error ? e.message : String(e));
    }
}

/**
 * Read a JSON file and check it against a zod shape.
 */
export function readJsonFile<T extends z.ZodTypeAny>(
    filePath: string,
    schema: T,
    role: string = 'Input'
): z.infer<T> {
    const text = readTextFile(filePath, role);

    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (e) {
        throw createJsonDecodeError(filePath, e instanceof Error ? e.message : String(e));
    }

    const result = schema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`);
        throw createInvalidInputError(filePath, schema.description ?? 'JSON document', issues);
    }
    return result.data;
}

/**
 * Write a whole document, pretty-printed, creating parent directories as needed.
 */
export function writeJsonFile(filePath: string, value: unknown): void {
    const dir = path.dirname(filePath);
    if (dir && !fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(filePath, stringifyJson(value));
}

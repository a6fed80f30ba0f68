/**
 * Document sources
 *
 * FolderDocumentSource reads exactly two .txt/.md papers from a directory
 * (sorted by file name: the first is A, the second B) and narrows each to its
 * abstract. InlineDocumentSource serves texts supplied directly.
 *
 * @module services/extraction/document-reader
 */

import * as fs from 'fs';
import * as path from 'path';
import type { SourceDocument } from '../../models/document.js';
import { InputValidationError } from '../../server/errors.js';
import type { DocumentSource } from '../capabilities.js';

export const SUPPORTED_EXTENSIONS = ['.txt', '.md'] as const;

/** Characters kept when no abstract heading is found */
const NO_ABSTRACT_CHARS = 3000;

/** Longest abstract kept */
const MAX_ABSTRACT_CHARS = 5000;

const ABSTRACT_START = /^[ \t#*]*(abstract|summary)[ \t*]*(?:[:.][ \t]*|\r?\n)/im;

const ABSTRACT_END =
  /\n[ \t#*]*(keywords|key words|(1\.?[ \t]+)?introduction|(1\.?[ \t]+)?background|2\.?[ \t]+\S)/i;

/**
 * First non-empty line, without markdown heading markers.
 */
export function extractTitle(content: string): string {
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.replace(/^#+\s*/, '').trim();
    if (trimmed.length > 0) {
      return trimmed;
    }
  }
  return '';
}

/**
 * Text between an "Abstract"/"Summary" heading and the next section heading.
 * Without a heading, the first 3000 characters are returned.
 */
export function extractAbstractSection(content: string): string {
  const start = ABSTRACT_START.exec(content);
  if (!start) {
    return content.slice(0, NO_ABSTRACT_CHARS).trim();
  }

  const bodyStart = start.index + start[0].length;
  const rest = content.slice(bodyStart);
  const end = ABSTRACT_END.exec(rest);
  const body = (end ? rest.slice(0, end.index) : rest).trim();

  return body.slice(0, MAX_ABSTRACT_CHARS);
}

export class FolderDocumentSource implements DocumentSource {
  readonly name = 'folder';
  private readonly folderPath: string;

  constructor(folderPath: string) {
    this.folderPath = path.resolve(folderPath);
  }

  /**
   * @throws InputValidationError unless the folder holds exactly two supported files
   */
  async readDocuments(): Promise<[SourceDocument, SourceDocument]> {
    if (!fs.existsSync(this.folderPath)) {
      throw new InputValidationError(`Input folder does not exist: ${this.folderPath}`, {
        path: this.folderPath,
      });
    }
    if (!fs.statSync(this.folderPath).isDirectory()) {
      throw new InputValidationError(`Path is not a directory: ${this.folderPath}`, {
        path: this.folderPath,
      });
    }

    const files = fs
      .readdirSync(this.folderPath)
      .filter((name) => SUPPORTED_EXTENSIONS.some((ext) => name.toLowerCase().endsWith(ext)))
      .sort();

    if (files.length !== 2) {
      throw new InputValidationError(
        `Expected exactly 2 documents (${SUPPORTED_EXTENSIONS.join(', ')}) in ${this.folderPath}, found ${files.length}`,
        { path: this.folderPath, files }
      );
    }

    const [first, second] = await Promise.all(files.map((name) => this.readOne(name)));
    return [first, second];
  }

  private async readOne(fileName: string): Promise<SourceDocument> {
    const filePath = path.join(this.folderPath, fileName);
    const content = await fs.promises.readFile(filePath, 'utf-8');
    const title = extractTitle(content) || path.parse(fileName).name;
    return { title, text: extractAbstractSection(content), origin: filePath };
  }
}

export class InlineDocumentSource implements DocumentSource {
  readonly name = 'inline';
  private readonly documents: [SourceDocument, SourceDocument];

  constructor(documentA: { title: string; text: string }, documentB: { title: string; text: string }) {
    this.documents = [
      { ...documentA, origin: 'inline' },
      { ...documentB, origin: 'inline' },
    ];
  }

  async readDocuments(): Promise<[SourceDocument, SourceDocument]> {
    return [{ ...this.documents[0] }, { ...this.documents[1] }];
  }
}

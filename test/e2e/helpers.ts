import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { textSource } from '../../src/collab/sources.js';
import { Workspace } from '../../src/document/Workspace.js';
import type { Tab } from '../../src/document/Workspace.js';
import type { DocumentOptions } from '../../src/document/Document.js';
import type { LoadedSource, Loader, PersistenceCollaborator, SavePayload } from '../../src/types/collaborators.js';
import type { Command, ViewState } from '../../src/types/commands.js';
import type { Result } from '../../src/types/error.js';
import type { Document } from '../../src/document/Document.js';
import { ok } from '../../src/utils/errors.js';

// --- Filesystem helpers ----------------------------------------------------

// Each test gets its own temp root so files never leak between tests.
export function createTempDir(prefix = 'linegrid-e2e-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeText(dir: string, name: string, text: string): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, text, 'utf8');
  return filePath;
}

export function readText(filePath: string): string {
  return fs.readFileSync(filePath, 'utf8');
}

// --- Collaborator stand-ins ------------------------------------------------

// Size plus mtime, like an editor's change check.
function stamp(filePath: string): string {
  const stat = fs.statSync(filePath);
  return `${stat.size}:${stat.mtimeMs}`;
}

// Reads UTF-8 files and stamps them for external-change checks.
export class FileLoader implements Loader<string> {
  load(filePath: string): Result<LoadedSource> {
    const text = fs.readFileSync(filePath, 'utf8');
    return ok(textSource(path.basename(filePath), text, stamp(filePath)));
  }

  identity(filePath: string): Result<string | undefined> {
    return ok(fs.existsSync(filePath) ? stamp(filePath) : undefined);
  }
}

// Writes a pane back to `dir/label`; remembers every payload it was given.
export class FilePersistence implements PersistenceCollaborator {
  readonly saved: SavePayload[] = [];

  constructor(private readonly dir: string) {}

  save(payload: SavePayload): Result<string | undefined> {
    const filePath = path.join(this.dir, payload.label);
    fs.writeFileSync(filePath, payload.text, 'utf8');
    this.saved.push(payload);
    return ok(stamp(filePath));
  }
}

// --- Document helpers ------------------------------------------------------

export function openFiles(files: readonly string[], options: Partial<DocumentOptions> = {}): Tab {
  const opened = new Workspace().open(new FileLoader(), files, options);
  if (!opened.ok) throw new Error(opened.error.message);
  return opened.value;
}

export function run(doc: Document, command: Command): ViewState {
  const result = doc.execute(command);
  if (!result.ok) throw new Error(`${command.type} failed: ${result.error.message}`);
  return result.view;
}

export function paneTexts(view: ViewState, pane: number): string[] {
  return view.panes[pane].lines.map((line) => line.text);
}

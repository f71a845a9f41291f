import { describe, expect, it } from 'vitest';
import { Workspace } from './Workspace.js';
import { textSource } from '../collab/sources.js';
import type { Loader, Revision, VcsCollaborator } from '../types/collaborators.js';
import { ErrorCode, RowKind } from '../types/enums.js';
import { fail, ok } from '../utils/errors.js';

const files = new Map([
  ['left.txt', 'a\nb\n'],
  ['right.txt', 'a\nc\n']
]);

const loader: Loader<string> = {
  load(name) {
    const text = files.get(name);
    return text === undefined ? fail(ErrorCode.LOAD_ERROR, `missing ${name}`) : ok(textSource(name, text));
  }
};

describe('Workspace', () => {
  it('opens a tab per comparison and closes it', () => {
    const workspace = new Workspace();
    const opened = workspace.open(loader, ['left.txt', 'right.txt']);
    if (!opened.ok) throw new Error(opened.error.message);
    const tab = opened.value;
    expect(tab.title).toBe('left.txt | right.txt');
    expect(tab.document.snapshot().blocks.map((block) => block.kind)).toEqual([RowKind.CHANGED]);
    expect(workspace.get(tab.tabId)).toBe(tab);
    expect(workspace.tabs()).toEqual([tab]);
    expect(workspace.close(tab.tabId)).toBe(true);
    expect(workspace.get(tab.tabId)).toBeUndefined();
    expect(workspace.close(tab.tabId)).toBe(false);
  });

  it('keeps documents independent', () => {
    const workspace = new Workspace();
    const first = workspace.open(loader, ['left.txt', 'right.txt']);
    const second = workspace.open(loader, ['left.txt', 'right.txt']);
    if (!first.ok || !second.ok) throw new Error('open failed');
    first.value.document.execute({ type: 'edit', pane: 1, start: 1, deleteCount: 1, lines: ['b'] });
    expect(first.value.document.snapshot().blocks).toEqual([]);
    expect(second.value.document.snapshot().blocks).toHaveLength(1);
  });

  it('creates no tab when a load fails', () => {
    const workspace = new Workspace();
    const result = workspace.open(loader, ['left.txt', 'gone.txt']);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('missing gone.txt');
    expect(workspace.tabs()).toEqual([]);
  });

  it('maps a throwing loader to LOAD_ERROR', () => {
    const throwing: Loader<string> = {
      load() {
        throw new Error('unreadable');
      }
    };
    const result = new Workspace().open(throwing, ['x']);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.LOAD_ERROR);
      expect(result.error.details).toEqual({ source: 'x' });
    }
  });

  it('opens revisions fetched from version control', () => {
    const history: Record<string, string> = { r1: 'x\n', r2: 'y\n' };
    const vcs: VcsCollaborator = {
      listRevisions: () => ok([]),
      fetch: (path, revision) => ok(textSource(`${path}@${revision.id}`, history[revision.id]))
    };
    const revisions: Revision[] = [
      { id: 'r1', label: 'first' },
      { id: 'r2', label: 'second' }
    ];
    const opened = new Workspace({ referencePane: 1 }).openRevisions('notes.txt', revisions, vcs);
    if (!opened.ok) throw new Error(opened.error.message);
    expect(opened.value.title).toBe('notes.txt@r1 | notes.txt@r2');
    expect(opened.value.document.snapshot().referencePane).toBe(1);

    const failing: VcsCollaborator = {
      listRevisions: () => ok([]),
      fetch: () => {
        throw new Error('offline');
      }
    };
    const failed = new Workspace().openRevisions('notes.txt', revisions, failing);
    expect(failed.ok).toBe(false);
    if (!failed.ok) expect(failed.error).toMatchObject({ code: ErrorCode.FETCH_ERROR, details: { path: 'notes.txt', revision: 'r1' } });
  });
});

import type { LoadedSource, Loader, Revision, VcsCollaborator } from '../types/collaborators.js';
import type { Result } from '../types/error.js';
import type { TabId } from '../types/ids.js';
import { ErrorCode } from '../types/enums.js';
import { callCollaborator } from '../collab/errorMapper.js';
import { createId } from '../utils/id.js';
import { ok } from '../utils/errors.js';
import { Document } from './Document.js';
import type { DocumentOptions } from './Document.js';

export interface Tab {
  readonly tabId: TabId;
  readonly title: string;
  readonly document: Document;
}

/** Open comparison tabs. Each tab owns its Document; tabs share nothing. */
export class Workspace {
  private readonly openTabs = new Map<TabId, Tab>();

  constructor(private readonly defaults: Partial<DocumentOptions> = {}) {}

  open<S>(loader: Loader<S>, sources: readonly S[], options: Partial<DocumentOptions> = {}): Result<Tab> {
    const loaded: LoadedSource[] = [];
    for (const source of sources) {
      const result = callCollaborator(() => loader.load(source), ErrorCode.LOAD_ERROR, { source: String(source) });
      if (!result.ok) return result;
      loaded.push(result.value);
    }
    return this.openLoaded(loaded, options);
  }

  /** Opens one pane per revision of `path`, in the order given. */
  openRevisions(path: string, revisions: readonly Revision[], vcs: VcsCollaborator, options: Partial<DocumentOptions> = {}): Result<Tab> {
    const loaded: LoadedSource[] = [];
    for (const revision of revisions) {
      const result = callCollaborator(() => vcs.fetch(path, revision), ErrorCode.FETCH_ERROR, { path, revision: revision.id });
      if (!result.ok) return result;
      loaded.push(result.value);
    }
    return this.openLoaded(loaded, options);
  }

  openLoaded(sources: readonly LoadedSource[], options: Partial<DocumentOptions> = {}): Result<Tab> {
    const document = Document.create(sources, { ...this.defaults, ...options });
    if (!document.ok) return document;
    const tab: Tab = {
      tabId: createId('tab:'),
      title: sources.map((source) => source.label).join(' | '),
      document: document.value
    };
    this.openTabs.set(tab.tabId, tab);
    return ok(tab);
  }

  get(tabId: TabId): Tab | undefined {
    return this.openTabs.get(tabId);
  }

  close(tabId: TabId): boolean {
    return this.openTabs.delete(tabId);
  }

  tabs(): Tab[] {
    return [...this.openTabs.values()];
  }
}

import type {
  DocumentHandle,
  HeadingHistogram,
  LinkCounts,
} from '../config/types/analysis.js';

import type { TaskGroup } from '../services/task-group.js';

import {
  extractHeadings,
  extractHtmlVersion,
  extractPageTitle,
} from './field-extractors.js';
import { countLinks } from './link-classifier.js';
import { hasLoginForm } from './login-form.js';

export interface ExtractionContext {
  readonly document: DocumentHandle;
  readonly pageUrl: URL;
}

/** Mutable record fields, filled by passes before the record is frozen. */
export interface AnalysisDraft {
  htmlVersion: string;
  pageTitle: string;
  headings: HeadingHistogram;
  links: LinkCounts;
  hasLoginForm: boolean;
}

/**
 * One independent, idempotent read of the document. `merge` writes the
 * pass's own slice of the draft and nothing else.
 */
export interface ExtractionPass<T> {
  readonly name: string;
  extract(context: ExtractionContext): T;
  merge(draft: AnalysisDraft, value: T): void;
}

/** Applies a finished task's value to the draft; failed tasks leave it untouched. */
export type PendingMerge = (draft: AnalysisDraft) => void;

/**
 * A pass with its value type hidden, so passes of different types can share
 * one registry array.
 */
export interface RegisteredPass {
  readonly name: string;
  schedule(group: TaskGroup, context: ExtractionContext): PendingMerge;
}

export function registerPass<T>(pass: ExtractionPass<T>): RegisteredPass {
  return {
    name: pass.name,
    schedule(group, context) {
      const handle = group.add(pass.name, () => pass.extract(context));
      return (draft) => {
        const { outcome } = handle;
        if (outcome?.ok) pass.merge(draft, outcome.value);
      };
    },
  };
}

export function createDraft(): AnalysisDraft {
  return {
    htmlVersion: '',
    pageTitle: '',
    headings: {},
    links: { internal: 0, external: 0, inaccessible: 0 },
    hasLoginForm: false,
  };
}

export const htmlVersionPass = registerPass<string>({
  name: 'htmlVersion',
  extract: ({ document }) => extractHtmlVersion(document.root),
  merge: (draft, value) => {
    draft.htmlVersion = value;
  },
});

export const pageTitlePass = registerPass<string>({
  name: 'pageTitle',
  extract: ({ document }) => extractPageTitle(document.root),
  merge: (draft, value) => {
    draft.pageTitle = value;
  },
});

export const headingsPass = registerPass<HeadingHistogram>({
  name: 'headings',
  extract: ({ document }) => extractHeadings(document.root),
  merge: (draft, value) => {
    draft.headings = value;
  },
});

export const linksPass = registerPass<LinkCounts>({
  name: 'links',
  extract: ({ document, pageUrl }) => countLinks(document.root, pageUrl),
  merge: (draft, value) => {
    draft.links = value;
  },
});

export const loginFormPass = registerPass<boolean>({
  name: 'loginForm',
  extract: ({ document }) => hasLoginForm(document.root),
  merge: (draft, value) => {
    draft.hasLoginForm = value;
  },
});

export const DEFAULT_PASSES: readonly RegisteredPass[] = [
  htmlVersionPass,
  pageTitlePass,
  headingsPass,
  linksPass,
  loginFormPass,
];

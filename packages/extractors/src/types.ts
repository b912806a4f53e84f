/**
 * Page structure types shared with the enumerator
 */

export type PageEntry = {
  /** 0-based position in the navigation control, in displayed order */
  index: number;
  /** Display name; "page N" when the control shows no label */
  name: string;
  /** Raw label read from the control, used to detect stale entries */
  label: string;
};

/**
 * Capability for discovering and switching the pages of a report.
 */
export interface PageStructureProbe {
  hasMultiPageControl(): Promise<boolean>;
  listPageEntries(): Promise<PageEntry[]>;
  activatePage(entry: PageEntry): Promise<void>;
}

export type PageControlSelector = {
  /** Container of the page list, e.g. a tab strip */
  container: string;
  /** Entries inside the container */
  entry: string;
};

export type PageNavigationConfig = {
  controls: PageControlSelector[];
};

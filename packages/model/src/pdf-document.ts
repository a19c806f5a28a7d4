import type { PageContent } from './page-content';

/**
 * An open PDF document, as exposed by the host's PDF library.
 * Must be closed once the request is done with it.
 */
export interface PdfDocumentHandle {
  readonly pageCount: number;

  /** Load a page by zero-based index */
  loadPage(index: number): PageContent | Promise<PageContent>;

  close(): void | Promise<void>;
}

/**
 * Opens documents from whatever source the host holds (path, buffer, ...).
 */
export interface PdfDocumentLoader<TSource> {
  open(source: TSource): Promise<PdfDocumentHandle>;
}

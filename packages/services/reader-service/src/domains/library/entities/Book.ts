/**
 * Book Entity - Reader Service Domain Model
 * Metadata, spine and table of contents of a processed book, frozen at load time
 */

import { Chapter } from './Chapter';

export interface BookMetadata {
  readonly title: string;
  readonly authors: readonly string[];
  readonly language?: string;
  readonly description?: string;
  readonly publisher?: string;
  readonly date?: string;
  readonly identifiers: readonly string[];
  readonly subjects: readonly string[];
}

export interface TocEntry {
  readonly title: string;
  readonly href: string;
  /** Chapter file the entry points into, without the fragment */
  readonly fileHref: string;
  /** Fragment part of `href`, empty when the entry targets the whole file */
  readonly anchor: string;
  readonly children: readonly TocEntry[];
}

export interface BookProps {
  id: string;
  metadata: BookMetadata;
  spine: readonly Chapter[];
  toc?: readonly TocEntry[];
  images?: Readonly<Record<string, string>>;
  sourceFile?: string;
  processedAt?: string;
}

function freezeToc(entries: readonly TocEntry[]): readonly TocEntry[] {
  return Object.freeze(
    entries.map(entry =>
      Object.freeze({
        title: entry.title,
        href: entry.href,
        fileHref: entry.fileHref,
        anchor: entry.anchor,
        children: freezeToc(entry.children),
      })
    )
  );
}

export class Book {
  readonly id: string;
  readonly metadata: BookMetadata;
  readonly spine: readonly Chapter[];
  readonly toc: readonly TocEntry[];
  readonly images: Readonly<Record<string, string>>;
  readonly sourceFile?: string;
  readonly processedAt?: string;

  constructor(props: BookProps) {
    this.id = props.id;
    this.metadata = Object.freeze({
      ...props.metadata,
      authors: Object.freeze([...props.metadata.authors]),
      identifiers: Object.freeze([...props.metadata.identifiers]),
      subjects: Object.freeze([...props.metadata.subjects]),
    });
    this.spine = Object.freeze([...props.spine]);
    this.toc = freezeToc(props.toc ?? []);
    this.images = Object.freeze({ ...props.images });
    this.sourceFile = props.sourceFile;
    this.processedAt = props.processedAt;
    Object.freeze(this);
  }

  get title(): string {
    return this.metadata.title;
  }

  get authors(): readonly string[] {
    return this.metadata.authors;
  }

  get chapterCount(): number {
    return this.spine.length;
  }

  /**
   * Authors as a single display string
   */
  get authorLine(): string {
    return this.metadata.authors.join(', ');
  }

  /**
   * Spine index of the chapter whose href is `fileHref`, or null
   */
  indexOfHref(fileHref: string): number | null {
    const index = this.spine.findIndex(chapter => chapter.href === fileHref);
    return index === -1 ? null : index;
  }
}

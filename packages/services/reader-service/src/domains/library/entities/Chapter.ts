/**
 * Chapter Entity
 * One spine item of a book. Values are never mutated; narrowing returns a copy.
 */

export interface ChapterProps {
  id: string;
  href: string;
  title: string;
  content: string;
  text: string;
  order: number;
}

export class Chapter {
  readonly id: string;
  readonly href: string;
  readonly title: string;
  readonly content: string;
  /** Plain-text rendering produced by the book processor */
  readonly text: string;
  readonly order: number;

  constructor(props: ChapterProps) {
    this.id = props.id;
    this.href = props.href;
    this.title = props.title;
    this.content = props.content;
    this.text = props.text;
    this.order = props.order;
    Object.freeze(this);
  }

  /**
   * Same chapter showing only `content`; identity fields and `text` are carried over
   */
  withContent(content: string): Chapter {
    return new Chapter({
      id: this.id,
      href: this.href,
      title: this.title,
      content,
      text: this.text,
      order: this.order,
    });
  }
}

export * from './DocumentTree';
export * from './HtmlParser';
export * from './HtmlSerializer';
export * from './headings';

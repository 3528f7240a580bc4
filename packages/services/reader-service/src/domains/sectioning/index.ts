export * from './AnchorResolver';
export * from './SectionExtractor';
export * from './SubsectionBuilder';

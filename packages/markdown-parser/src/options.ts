export interface ParseOptions {
  tables?: boolean;
  footnotes?: boolean;
  strikethrough?: boolean;
  tasklists?: boolean;
  smartPunctuation?: boolean;
  headingAttributes?: boolean;
  plusesMetadataBlocks?: boolean;
  yamlMetadataBlocks?: boolean;
  math?: boolean;
  /**
   * Substituted chunks longer than this many UTF-8 bytes are reported as
   * suspicious. Entities, dashes, quotes and ellipses all fit in 4.
   */
  substitutionLengthThreshold?: number;
  debug?: boolean;
}

export type ResolvedParseOptions = Required<ParseOptions>;

export const DEFAULT_PARSE_OPTIONS: ResolvedParseOptions = {
  tables: true,
  footnotes: true,
  strikethrough: true,
  tasklists: true,
  smartPunctuation: true,
  headingAttributes: true,
  plusesMetadataBlocks: true,
  yamlMetadataBlocks: false,
  math: false,
  substitutionLengthThreshold: 4,
  debug: false,
};

export function resolveParseOptions(options: ParseOptions = {}): ResolvedParseOptions {
  const defaults = DEFAULT_PARSE_OPTIONS;
  return {
    tables: options.tables ?? defaults.tables,
    footnotes: options.footnotes ?? defaults.footnotes,
    strikethrough: options.strikethrough ?? defaults.strikethrough,
    tasklists: options.tasklists ?? defaults.tasklists,
    smartPunctuation: options.smartPunctuation ?? defaults.smartPunctuation,
    headingAttributes: options.headingAttributes ?? defaults.headingAttributes,
    plusesMetadataBlocks: options.plusesMetadataBlocks ?? defaults.plusesMetadataBlocks,
    yamlMetadataBlocks: options.yamlMetadataBlocks ?? defaults.yamlMetadataBlocks,
    math: options.math ?? defaults.math,
    substitutionLengthThreshold: options.substitutionLengthThreshold ?? defaults.substitutionLengthThreshold,
    debug: options.debug ?? defaults.debug,
  };
}

import type { TabularTable } from '../../table/tabular-table.js';

export interface TabularDecoderPort {
  /** Fails with ParseError on anything that is neither XLSX nor well-formed CSV. */
  decode(bytes: Buffer): Promise<TabularTable>;
}

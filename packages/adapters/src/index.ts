// ─── Tabular Files ─────────────────────────────────────────────────────────────
export {
  TabularFileDecoder,
  decodeTabular,
  isSpreadsheet,
  normalizeHeader,
  parseCellText,
} from './tabular/tabular-decoder.js';

// ─── ZIP Archives ─────────────────────────────────────────────────────────────
export { JsZipArchiveReader } from './zip/zip-archive.reader.js';

// ─── Run Store ────────────────────────────────────────────────────────────────
export { InMemoryRunStore } from './memory/run-store.repository.js';

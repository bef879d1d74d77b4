import type { RawRow, RowStream } from '../src/domain/ports/RowStream.js';
import type { SchemaInput } from '../src/domain/model/Schema.js';
import type { IngestionSettings } from '../src/config.js';
import type { Document } from '../src/domain/model/Document.js';
import type { CellValue } from '../src/domain/model/CellValue.js';
import { toCellValue } from '../src/domain/model/CellValue.js';
import { IngestionEngine } from '../src/IngestionEngine.js';
import { InMemoryDocumentStore } from '../src/infrastructure/stores/InMemoryDocumentStore.js';
import { InMemoryMetadataStore } from '../src/infrastructure/stores/InMemoryMetadataStore.js';
import { createSilentLogger } from '../src/infrastructure/logging/createLogger.js';
import { StoreUnavailableError } from '../src/domain/errors.js';

/**
 * Row stream over literal values. The header is sheet row 1, so the first
 * record is row 2. `pulled` counts the rows handed out.
 */
export class ArrayRowStream implements RowStream {
  pulled = 0;

  constructor(
    private readonly labels: readonly string[],
    private readonly records: readonly (readonly unknown[])[],
  ) {}

  columns(): Promise<readonly string[]> {
    return Promise.resolve(this.labels);
  }

  async *rows(fromRow = 2): AsyncIterable<RawRow> {
    for (const [i, values] of this.records.entries()) {
      const rowNumber = i + 2;
      if (rowNumber < fromRow) continue;
      const cells: Record<string, CellValue> = {};
      this.labels.forEach((label, j) => {
        cells[label] = toCellValue(values[j]);
      });
      this.pulled++;
      yield await Promise.resolve({ rowNumber, cells });
    }
  }
}

export function rowsOf(labels: readonly string[], records: readonly (readonly unknown[])[]): ArrayRowStream {
  return new ArrayRowStream(labels, records);
}

export const customerSchema: SchemaInput = {
  name: 'Customers',
  collection: 'customers',
  fields: [
    { column: 'Email', attribute: { field: 'email', type: 'String', required: true } },
    { column: 'Name', attribute: { field: 'name', type: 'String' } },
    { column: 'Amount', attribute: { field: 'amount', type: 'Number' } },
  ],
  duplicateKey: ['email'],
  duplicateStrategy: 'skip',
};

export const customerLabels = ['Email', 'Name', 'Amount'];

export const customerRecords = [
  ['alice@example.com', 'Alice', '10'],
  ['bob@example.com', 'Bob', '20'],
  ['carol@example.com', 'Carol', '30'],
];

export interface TestEngine {
  readonly engine: IngestionEngine;
  readonly documents: InMemoryDocumentStore;
  readonly metadata: InMemoryMetadataStore;
}

export function createTestEngine(
  settings: Partial<IngestionSettings> = {},
  documents: InMemoryDocumentStore = new InMemoryDocumentStore(),
  metadata: InMemoryMetadataStore = new InMemoryMetadataStore(),
): TestEngine {
  const engine = new IngestionEngine({ documents, metadata, settings, logger: createSilentLogger() });
  return { engine, documents, metadata };
}

/** Document store whose writes can be made to fail, standing in for a backend that goes away. */
export class FlakyDocumentStore extends InMemoryDocumentStore {
  /** Inserts succeed this many more times, then reject. `null` never fails. */
  insertsBeforeOutage: number | null = null;
  failDeletes = false;

  override insert(collection: string, document: Document): Promise<string> {
    if (this.insertsBeforeOutage !== null) {
      if (this.insertsBeforeOutage <= 0) return Promise.reject(new StoreUnavailableError('Connection reset'));
      this.insertsBeforeOutage--;
    }
    return super.insert(collection, document);
  }

  override delete(collection: string, id: string): Promise<boolean> {
    if (this.failDeletes) return Promise.reject(new Error('Connection reset'));
    return super.delete(collection, id);
  }
}

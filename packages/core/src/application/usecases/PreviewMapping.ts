import type { ColumnMapping } from '../../domain/services/ColumnMapper.js';
import type { EngineContext } from '../EngineContext.js';
import { resolveColumnMapping } from '../../domain/services/ColumnMapper.js';

/** How a file would map onto a schema, computed without touching any store. */
export interface MappingPreview extends ColumnMapping {
  readonly schemaId: string;
  /** `false` when a required field has no column: importing would fail. */
  readonly importable: boolean;
}

/** Use case: dry-run the column mapping of a file against a saved schema. */
export class PreviewMapping {
  constructor(private readonly ctx: EngineContext) {}

  async execute(schemaId: string, labels: readonly string[]): Promise<MappingPreview> {
    const schema = await this.ctx.catalog.get(schemaId);
    const mapping = resolveColumnMapping(labels, schema, this.ctx.settings.fuzzyThreshold);
    return { schemaId, ...mapping, importable: mapping.missingRequired.length === 0 };
  }
}

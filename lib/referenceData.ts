import type { ReferenceData } from '@/lib/algorithm/models';

/**
 * Where reference records come from (database, fixtures...).
 * The scheduler core only ever sees the parsed ReferenceData.
 */
export interface ReferenceDataSource {
  load(): Promise<ReferenceData>;
}

export class StaticReferenceDataSource implements ReferenceDataSource {
  constructor(private readonly data: ReferenceData) {}

  async load(): Promise<ReferenceData> {
    return this.data;
  }
}

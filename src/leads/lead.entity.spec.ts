import { getMetadataArgsStorage } from 'typeorm';
import { Lead } from './lead.entity';

describe('Lead entity', () => {
  it('should store niche confidence at double precision', () => {
    const column = getMetadataArgsStorage().columns.find(
      (args) => args.target === Lead && args.propertyName === 'nicheConfidence',
    );

    expect(column?.options.type).toBe('double precision');
  });
});

import { resolveColumns, similarity } from './column-resolver';

describe('resolveColumns', () => {
  it('takes "total_price" as the total through the price synonym', () => {
    const result = resolveColumns(['description', 'total_price']);

    expect(result).toEqual({
      complete: true,
      roles: { description: 'description', total: 'total_price' },
    });
  });

  it('takes "qty" as the quantity', () => {
    const result = resolveColumns(['desc', 'qty', 'rcv']);

    expect(result.roles.quantity).toBe('qty');
    expect(result.roles.description).toBe('desc');
    expect(result.roles.total).toBe('rcv');
  });

  it('lets a later matching column replace an earlier one', () => {
    const result = resolveColumns(['description', 'quantity', 'unit', 'unit_price', 'tax', 'rcv']);

    expect(result.roles).toEqual({
      description: 'description',
      quantity: 'quantity',
      unit: 'unit',
      total: 'rcv',
    });
  });

  it('matches near spellings by similarity', () => {
    expect(similarity('dscription', 'description')).toBeGreaterThan(70);

    const result = resolveColumns(['dscription', 'totl']);

    expect(result.roles.description).toBe('dscription');
    expect(result.roles.total).toBe('totl');
  });

  it('reports the missing required roles', () => {
    const result = resolveColumns(['item', 'amount', 'qty']);

    expect(result).toEqual({
      complete: false,
      roles: { quantity: 'qty' },
      missing: ['description', 'total'],
    });
  });

  it('honours a stricter threshold', () => {
    expect(similarity('totl', 'total')).toBe(89);

    const result = resolveColumns(['totl', 'description'], 95);

    expect(result).toEqual({
      complete: false,
      roles: { description: 'description' },
      missing: ['total'],
    });
  });

  it('still matches synonyms above the threshold', () => {
    const result = resolveColumns(['desc_text', 'rcv'], 99);

    expect(result).toEqual({
      complete: true,
      roles: { description: 'desc_text', total: 'rcv' },
    });
  });
});

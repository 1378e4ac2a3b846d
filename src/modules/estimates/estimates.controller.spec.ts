import { ValidationPipe } from '@nestjs/common';
import { Test } from '@nestjs/testing';

import { AnalyzeEstimateDto, ResumeEstimateDto } from './dto';
import { EstimatesController } from './estimates.controller';
import { EstimatesService } from './estimates.service';

describe('EstimatesController', () => {
  let controller: EstimatesController;
  const estimatesService = {
    analyze: jest.fn(),
    resume: jest.fn(),
    health: jest.fn(() => ({ status: 'ok', extractors: ['csv', 'xlsx'] })),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    const moduleRef = await Test.createTestingModule({
      controllers: [EstimatesController],
      providers: [{ provide: EstimatesService, useValue: estimatesService }],
    }).compile();

    controller = moduleRef.get(EstimatesController);
  });

  it('hands payloads to the service', async () => {
    const payload = new AnalyzeEstimateDto();
    estimatesService.analyze.mockResolvedValue({ status: 'completed' });

    await expect(controller.analyze(payload)).resolves.toEqual({ status: 'completed' });
    expect(estimatesService.analyze).toHaveBeenCalledWith(payload);
    expect(controller.health()).toEqual({ status: 'ok', extractors: ['csv', 'xlsx'] });
  });
});

describe('estimate payload validation', () => {
  const pipe = new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true });

  const analyze = (value: unknown) =>
    pipe.transform(value, { type: 'body', metatype: AnalyzeEstimateDto });

  const valid = {
    buffer: Buffer.from('Description,Total\nFelt,$10\n').toString('base64'),
    filename: 'estimate.csv',
    mimetype: 'text/csv',
    contractors: [{ name: 'Contractor 1', payoutFraction: 0.85 }],
  };

  it('accepts a payload without rules and defaults them to none', async () => {
    const dto: AnalyzeEstimateDto = await analyze(valid);

    expect(dto).toBeInstanceOf(AnalyzeEstimateDto);
    expect(dto.rules).toEqual([]);
  });

  it('rejects more than five contractors', async () => {
    const contractors = Array.from({ length: 6 }, (_, i) => ({ name: `C${i}`, payoutFraction: 0.5 }));

    await expect(analyze({ ...valid, contractors })).rejects.toMatchObject({
      response: { message: ['At most 5 contractors are supported'] },
    });
  });

  it('rejects payout fractions above 1', async () => {
    await expect(
      analyze({ ...valid, contractors: [{ name: 'A', payoutFraction: 85 }] }),
    ).rejects.toMatchObject({
      response: { message: ['contractors.0.payoutFraction must not be greater than 1'] },
    });
  });

  it('rejects unknown categories', async () => {
    await expect(
      analyze({ ...valid, rules: [{ category: 'HVAC', assignee: 'Contractor 1' }] }),
    ).rejects.toMatchObject({
      response: {
        message: [
          'rules.0.category must be one of the following values: Roofing, Electrical, Plumbing, Drywall/Painting, Foundation/Concrete, Other',
        ],
      },
    });
  });

  it('accepts a resume payload carrying the extracted table', async () => {
    const dto: ResumeEstimateDto = await pipe.transform(
      {
        table: { columns: ['item', 'amount'], rows: [{ item: 'Felt', amount: '$10' }] },
        columns: { description: 'item', total: 'amount' },
        contractors: [{ name: 'A', payoutFraction: 1 }],
      },
      { type: 'body', metatype: ResumeEstimateDto },
    );

    expect(dto.table.rows).toEqual([{ item: 'Felt', amount: '$10' }]);
    expect(dto.columns.total).toBe('amount');
  });
});

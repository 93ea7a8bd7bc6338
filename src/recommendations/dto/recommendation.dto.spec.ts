import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { validationPipeOptions } from '../../config/validation-pipe.options';
import { RecommendationDto } from './recommendation.dto';

async function validateBody(body: Record<string, unknown>) {
  const dto = plainToInstance(RecommendationDto, body, validationPipeOptions.transformOptions);
  const errors = await validate(dto, {
    whitelist: validationPipeOptions.whitelist,
    forbidNonWhitelisted: validationPipeOptions.forbidNonWhitelisted,
  });
  return { dto, errors };
}

describe('RecommendationDto', () => {
  it('accepts a valid body', async () => {
    const { dto, errors } = await validateBody({
      commanderName: 'Krenko, Mob Boss',
      useCollection: false,
      tieBreak: 'random',
    });

    expect(errors).toEqual([]);
    expect(dto).toMatchObject({ commanderName: 'Krenko, Mob Boss', useCollection: false, tieBreak: 'random' });
  });

  it('accepts a body with only the commander name', async () => {
    const { errors } = await validateBody({ commanderName: 'Krenko, Mob Boss' });

    expect(errors).toEqual([]);
  });

  it('rejects an empty commander name', async () => {
    const { errors } = await validateBody({ commanderName: '' });

    expect(errors).toHaveLength(1);
    expect(errors[0].property).toBe('commanderName');
    expect(Object.keys(errors[0].constraints ?? {})).toEqual(['minLength']);
  });

  it('rejects a missing commander name', async () => {
    const { errors } = await validateBody({});

    expect(errors.map((error) => error.property)).toEqual(['commanderName']);
  });

  it('rejects an unknown tie-break', async () => {
    const { errors } = await validateBody({ commanderName: 'Krenko, Mob Boss', tieBreak: 'catalog' });

    expect(errors).toHaveLength(1);
    expect(errors[0].property).toBe('tieBreak');
    expect(Object.keys(errors[0].constraints ?? {})).toEqual(['isIn']);
  });

  it('rejects fields outside the contract', async () => {
    const { errors } = await validateBody({ commanderName: 'Krenko, Mob Boss', budget: 100 });

    expect(errors).toHaveLength(1);
    expect(errors[0].property).toBe('budget');
    expect(Object.keys(errors[0].constraints ?? {})).toEqual(['whitelistValidation']);
  });
});

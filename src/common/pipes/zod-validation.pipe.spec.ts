import { ZodValidationPipe } from './zod-validation.pipe.js';
import { DecideBodySchema } from '../../shifts/dto/decide.dto.js';
import { InvalidInputError } from '../errors/game-errors.js';

describe('ZodValidationPipe', () => {
  const pipe = new ZodValidationPipe(DecideBodySchema);

  it('passes parsed data through', () => {
    const body = { expectedVersion: 2, encounterId: 'enc_1_abc', action: 'APPROVE' };
    expect(pipe.transform(body)).toEqual(body);
  });

  it('reports every issue with its path', () => {
    let caught: unknown;
    try {
      pipe.transform({ expectedVersion: -1, encounterId: 'enc_1_abc', action: 'WAVE' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(InvalidInputError);
    expect(caught).toMatchObject({
      httpStatus: 422,
      details: {
        issues: [
          'expectedVersion: Number must be greater than or equal to 0',
          "action: Invalid enum value. Expected 'APPROVE' | 'DENY', received 'WAVE'",
        ],
      },
    });
  });
});

import { NotFoundException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { GameExceptionFilter } from './game-exception.filter.js';
import { SessionConflictError } from '../errors/game-errors.js';

function makeResponse() {
  const res = {
    status: jest.fn(),
    json: jest.fn(),
  };
  res.status.mockReturnValue(res);
  return res;
}

describe('GameExceptionFilter', () => {
  const filter = new GameExceptionFilter();

  it('maps a GameError to its status and code', () => {
    const res = makeResponse();
    filter.catch(
      new SessionConflictError('ENCOUNTER_PENDING', 'Decide first', { encounterId: 'enc_1_a' }),
      new ExecutionContextHost([{}, res]),
    );

    expect(res.status).toHaveBeenCalledWith(409);
    expect(res.json).toHaveBeenCalledWith({
      code: 'ENCOUNTER_PENDING',
      message: 'Decide first',
      details: { encounterId: 'enc_1_a' },
    });
  });

  it('passes Nest HTTP exceptions through', () => {
    const res = makeResponse();
    filter.catch(new NotFoundException('No route'), new ExecutionContextHost([{}, res]));

    expect(res.status).toHaveBeenCalledWith(404);
    expect(res.json).toHaveBeenCalledWith(
      expect.objectContaining({ code: 'HTTP_ERROR', message: 'No route' }),
    );
  });

  it('hides unknown failures behind a 500', () => {
    const res = makeResponse();
    filter.catch(new Error('db down'), new ExecutionContextHost([{}, res]));

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
      details: null,
    });
  });
});

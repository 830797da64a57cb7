import { ArgumentsHost, BadRequestException } from '@nestjs/common';
import { ConfigurationError, NotFoundError } from '../errors';
import { HttpExceptionFilter } from './http-exception.filter';

describe('HttpExceptionFilter', () => {
  const filter = new HttpExceptionFilter();
  let json: jest.Mock;
  let status: jest.Mock;
  let host: ArgumentsHost;

  beforeEach(() => {
    json = jest.fn();
    status = jest.fn().mockReturnValue({ json });
    host = {
      switchToHttp: () => ({
        getResponse: () => ({ status }),
        getRequest: () => ({ method: 'POST', url: '/api/essays/grade' }),
      }),
    } as unknown as ArgumentsHost;
  });

  it('should answer application errors with their status and code', () => {
    filter.catch(new NotFoundError('Prompt "9" not found', 'PROMPT_NOT_FOUND'), host);

    expect(status).toHaveBeenCalledWith(404);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 404,
        message: 'Prompt "9" not found',
        error: 'PROMPT_NOT_FOUND',
        path: '/api/essays/grade',
      }),
    );
  });

  it('should include the offending fields of a validation error', () => {
    filter.catch(
      new ConfigurationError('Invalid rubric weights', [{ field: 'grammar', message: 'must be >= 0' }]),
      host,
    );

    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        error: 'CONFIGURATION_ERROR',
        fields: [{ field: 'grammar', message: 'must be >= 0' }],
      }),
    );
  });

  it('should join the messages of a pipe validation failure', () => {
    filter.catch(new BadRequestException(['essay must be a string', 'k must not be less than 1']), host);

    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 400,
        message: 'essay must be a string, k must not be less than 1',
        error: 'Bad Request',
      }),
    );
  });

  it('should hide the message of an unexpected error', () => {
    filter.catch(new TypeError('cannot read properties of undefined'), host);

    expect(status).toHaveBeenCalledWith(500);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({ message: 'Internal server error', error: 'INTERNAL_SERVER_ERROR' }),
    );
  });
});

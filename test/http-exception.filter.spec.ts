import { BadRequestException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { HttpExceptionFilter } from '../src/common/exceptions/http-exception.filter';
import {
  EntityNotFoundException,
  InvoiceCancelledException,
  PaymentExceedsDebtException,
} from '../src/common/exceptions/domain.exceptions';

describe('HttpExceptionFilter', () => {
  const filter = new HttpExceptionFilter();
  let response: { status: jest.Mock; json: jest.Mock };
  let host: ExecutionContextHost;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    response = { status: jest.fn().mockReturnThis(), json: jest.fn() };
    host = new ExecutionContextHost([{ method: 'POST', url: '/api/v1/payments' }, response]);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
    errorSpy.mockRestore();
  });

  const body = () => response.json.mock.calls[0][0];

  it('translates a missing entity into a 404', () => {
    filter.catch(new EntityNotFoundException('Invoice', 'abc'), host);

    expect(response.status).toHaveBeenCalledWith(404);
    expect(body()).toEqual({
      statusCode: 404,
      timestamp: expect.any(String),
      path: '/api/v1/payments',
      error: 'EntityNotFound',
      message: "Invoice with id 'abc' not found",
    });
  });

  it('exposes the broken rule of a business error', () => {
    filter.catch(new PaymentExceedsDebtException(700.01, 700), host);

    expect(response.status).toHaveBeenCalledWith(400);
    expect(body()).toMatchObject({
      statusCode: 400,
      error: 'BusinessRuleError',
      rule: 'payment_cannot_exceed_debt',
      message: 'Payment amount (700.01) exceeds pending amount (700.00)',
    });
  });

  it('reports payments on cancelled invoices under their own rule', () => {
    filter.catch(new InvoiceCancelledException('inv-1'), host);

    expect(body()).toMatchObject({ statusCode: 400, rule: 'no_payment_for_cancelled_invoice' });
  });

  it('passes validation messages through as a list', () => {
    filter.catch(new BadRequestException(['amount must not be less than 0.01']), host);

    expect(body()).toMatchObject({
      statusCode: 400,
      error: 'Bad Request',
      message: ['amount must not be less than 0.01'],
    });
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('answers unexpected errors with a 500 and logs the stack', () => {
    filter.catch(new Error('connection refused'), host);

    expect(response.status).toHaveBeenCalledWith(500);
    expect(body()).toMatchObject({ statusCode: 500, error: 'Error', message: 'connection refused' });
    expect(body()).not.toHaveProperty('rule');
    expect(errorSpy).toHaveBeenCalled();
  });
});

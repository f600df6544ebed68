import { describe, expect, it, vi } from 'vitest';
import type { Request, Response } from 'express';
import { checkoutSchema } from '../../validators/checkoutValidators';
import { validateOrderIdParam, validateOrderNumberParam } from '../../validators/orderValidators';
import { ValidationError } from '../../utils/errors';
import { validate, validateBody } from '../validation';

const res = {} as Response;

describe('validateBody(checkoutSchema)', () => {
  it('strips client-supplied amounts', () => {
    const req = { body: { amount: 1, customerNotes: '  ring twice ' } } as unknown as Request;
    const next = vi.fn();

    validateBody(checkoutSchema)(req, res, next);

    expect(next).toHaveBeenCalledWith();
    expect(req.body).toEqual({ customerNotes: 'ring twice' });
  });

  it('accepts an empty body', () => {
    const req = { body: undefined } as unknown as Request;
    const next = vi.fn();

    validateBody(checkoutSchema)(req, res, next);

    expect(next).toHaveBeenCalledWith();
    expect(req.body).toEqual({});
  });

  it('rejects an incomplete shipping address', () => {
    const req = { body: { shippingAddress: { line1: '1 Test Street' } } } as unknown as Request;
    const next = vi.fn();

    validateBody(checkoutSchema)(req, res, next);

    expect(next).toHaveBeenCalledWith(expect.any(ValidationError));
    expect(next.mock.calls[0][0]).toMatchObject({ message: 'Invalid request payload', status: 400 });
  });

  it('rejects notes longer than 500 characters', () => {
    const req = { body: { customerNotes: 'x'.repeat(501) } } as unknown as Request;
    const next = vi.fn();

    validateBody(checkoutSchema)(req, res, next);

    expect(next).toHaveBeenCalledWith(expect.any(ValidationError));
  });
});

describe('validate(validateOrderIdParam)', () => {
  it('accepts an ObjectId', async () => {
    const req = { params: { orderId: '65f0c0ffee0123456789abcd' } } as unknown as Request;
    const next = vi.fn();

    await validate(validateOrderIdParam)(req, res, next);

    expect(next).toHaveBeenCalledWith();
  });

  it('rejects anything else', async () => {
    const req = { params: { orderId: 'not-an-id' } } as unknown as Request;
    const next = vi.fn();

    await validate(validateOrderIdParam)(req, res, next);

    expect(next).toHaveBeenCalledWith(expect.any(ValidationError));
    expect(next.mock.calls[0][0]).toMatchObject({ message: 'Invalid request' });
  });
});

describe('validate(validateOrderNumberParam)', () => {
  it('normalises the case of a valid order number', async () => {
    const req = { params: { orderNumber: 'ord-20260301-a1b2c3d4' } } as unknown as Request;
    const next = vi.fn();

    await validate(validateOrderNumberParam)(req, res, next);

    expect(next).toHaveBeenCalledWith();
    expect(req.params.orderNumber).toBe('ORD-20260301-A1B2C3D4');
  });

  it('rejects malformed numbers', async () => {
    const req = { params: { orderNumber: 'ORD-2026-XYZ' } } as unknown as Request;
    const next = vi.fn();

    await validate(validateOrderNumberParam)(req, res, next);

    expect(next).toHaveBeenCalledWith(expect.any(ValidationError));
  });
});

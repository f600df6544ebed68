import { param, query } from 'express-validator';
import { ORDER_STATUSES } from '../types/order';

export const validateOrderIdParam = [
  param('orderId').isMongoId().withMessage('Invalid order ID'),
];

export const validateOrderNumberParam = [
  param('orderNumber')
    .trim()
    .toUpperCase()
    .matches(/^ORD-\d{8}-[0-9A-F]{8}$/)
    .withMessage('Invalid order number'),
];

export const validateListOrders = [
  query('page').optional().isInt({ min: 1 }).withMessage('page must be a positive integer').toInt(),
  query('limit').optional().isInt({ min: 1, max: 50 }).withMessage('limit must be between 1 and 50').toInt(),
  query('userId').optional().isString().trim().notEmpty().withMessage('userId must not be empty'),
];

export const validateListAllOrders = [
  ...validateListOrders,
  query('status').optional().isIn([...ORDER_STATUSES]).withMessage('Unknown order status'),
];

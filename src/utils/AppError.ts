/**
 * AppError - Custom error class for application errors
 * Distinguishes between system errors (500) and user errors (400, 402, etc.)
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);

    Object.setPrototypeOf(this, AppError.prototype);
  }
}


/**
 * OrderTransitionError - an order status change was requested from the wrong prior state
 * Reported to the acting staff member, never to the customer
 */
export class OrderTransitionError extends AppError {
  constructor(
    public readonly orderId: string,
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Order ${orderId} cannot move from ${from} to ${to}`, 409);
    this.name = 'OrderTransitionError';
    Object.setPrototypeOf(this, OrderTransitionError.prototype);
  }
}

export interface PaymentDetails {
  cardNumber: string;
  cvv?: string;
  /** Card expiry as `MM/YY`. */
  expiry?: string;
  cardholder?: string;
}

export interface PaymentReceipt {
  readonly success: boolean;
  readonly transactionId?: string;
  readonly message: string;
  readonly amount?: number;
  readonly timestamp?: string;
}

export interface PaymentProcessor {
  charge(details: PaymentDetails, amount: number): PaymentReceipt;
  refund(transactionId: string, amount: number): PaymentReceipt;
}

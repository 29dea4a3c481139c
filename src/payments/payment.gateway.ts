import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  PaymentDetails,
  PaymentProcessor,
  PaymentReceipt,
} from './interface/payment.interface';
import { CARD_BEHAVIOURS, MIN_CARD_NUMBER_LENGTH } from './payments.constants';

const maskCard = (cardNumber: string): string => `****${cardNumber.slice(-4)}`;

/**
 * Simulated card processor. Approval depends only on the first digit of the
 * card number; no authorization request leaves the process.
 */
@Injectable()
export class PaymentGateway implements PaymentProcessor {
  private readonly logger = new Logger(PaymentGateway.name);

  charge(details: PaymentDetails, amount: number): PaymentReceipt {
    const cardNumber = details.cardNumber ?? '';

    if (!cardNumber) {
      return { success: false, message: 'Card number is required' };
    }
    if (amount <= 0) {
      return { success: false, message: 'Amount must be greater than zero' };
    }
    if (cardNumber.length < MIN_CARD_NUMBER_LENGTH) {
      return { success: false, message: 'Invalid card number' };
    }

    const behaviour = CARD_BEHAVIOURS[cardNumber.charAt(0)];
    if (!behaviour?.approved) {
      this.logger.warn(`Payment declined for card ${maskCard(cardNumber)}`);
      return {
        success: false,
        message: 'Payment declined - insufficient funds or card blocked',
      };
    }

    this.logger.log(
      `Charged ${amount.toFixed(2)} to ${behaviour.brand} card ${maskCard(cardNumber)}`,
    );
    return {
      success: true,
      transactionId: uuidv4(),
      message: `Payment processed successfully with ${behaviour.brand}`,
      amount,
      timestamp: new Date().toISOString(),
    };
  }

  refund(transactionId: string, amount: number): PaymentReceipt {
    if (!transactionId) {
      return {
        success: false,
        message: 'Transaction id is required for a refund',
      };
    }

    this.logger.log(
      `Refunded ${amount.toFixed(2)} for transaction ${transactionId.slice(0, 8)}`,
    );
    return {
      success: true,
      transactionId: uuidv4(),
      message: 'Refund processed successfully',
      amount,
      timestamp: new Date().toISOString(),
    };
  }
}

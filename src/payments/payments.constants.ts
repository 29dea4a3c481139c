export const PAYMENT_GATEWAY = 'PAYMENT_GATEWAY';

export const MIN_CARD_NUMBER_LENGTH = 15;

export interface CardBehaviour {
  brand: string;
  approved: boolean;
}

// Keyed by the first digit of the card number.
export const CARD_BEHAVIOURS: Readonly<Record<string, CardBehaviour>> = {
  '4': { brand: 'Visa', approved: true },
  '5': { brand: 'MasterCard', approved: true },
  '3': { brand: 'American Express', approved: false },
  '6': { brand: 'Discover', approved: false },
};

export const SHIPPING = 'SHIPPING';

export const ESTIMATED_DELIVERY_DAYS = 3;
export const TRACKING_PREFIX = 'TRK';

import { ShipmentStatus } from '../enums/shipment-status.enum';

export interface ShipmentItem {
  productCode: string;
  quantity: number;
}

export interface ShipmentInfo {
  readonly success: boolean;
  readonly shipmentId?: string;
  readonly trackingNumber?: string;
  readonly etaDays: number;
  /** ISO date (`YYYY-MM-DD`). */
  readonly estimatedDelivery?: string;
  readonly message: string;
}

export interface TrackingInfo {
  trackingNumber: string;
  shipmentId: string;
  status: ShipmentStatus;
  lastUpdate: string;
}

export interface Shipping {
  createShipment(customerId: string, items: ShipmentItem[]): ShipmentInfo;
  trackShipment(trackingNumber: string): TrackingInfo | null;
  cancelShipment(shipmentId: string): boolean;
}

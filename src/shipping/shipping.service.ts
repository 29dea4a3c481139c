import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { ShipmentStatus } from './enums/shipment-status.enum';
import {
  ShipmentInfo,
  ShipmentItem,
  Shipping,
  TrackingInfo,
} from './interface/shipping.interface';
import { ESTIMATED_DELIVERY_DAYS, TRACKING_PREFIX } from './shipping.constants';

interface ShipmentRecord {
  shipmentId: string;
  trackingNumber: string;
  customerId: string;
  items: ShipmentItem[];
  status: ShipmentStatus;
  updatedAt: Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class ShippingService implements Shipping {
  private readonly logger = new Logger(ShippingService.name);
  private readonly shipments = new Map<string, ShipmentRecord>();

  createShipment(customerId: string, items: ShipmentItem[]): ShipmentInfo {
    if (items.length === 0) {
      return { success: false, etaDays: 0, message: 'No items to ship' };
    }
    if (!customerId) {
      return { success: false, etaDays: 0, message: 'Customer id is required' };
    }

    const shipmentId = uuidv4();
    const trackingNumber =
      TRACKING_PREFIX + shipmentId.slice(0, 8).toUpperCase();
    const now = new Date();
    const estimatedDelivery = new Date(
      now.getTime() + ESTIMATED_DELIVERY_DAYS * DAY_MS,
    )
      .toISOString()
      .slice(0, 10);

    this.shipments.set(shipmentId, {
      shipmentId,
      trackingNumber,
      customerId,
      items: items.map((item) => ({ ...item })),
      status: ShipmentStatus.CREATED,
      updatedAt: now,
    });

    this.logger.log(
      `Shipment ${trackingNumber} created for ${customerId}, estimated delivery ${estimatedDelivery}`,
    );

    return {
      success: true,
      shipmentId,
      trackingNumber,
      etaDays: ESTIMATED_DELIVERY_DAYS,
      estimatedDelivery,
      message: `Shipment scheduled for delivery in ${ESTIMATED_DELIVERY_DAYS} days`,
    };
  }

  trackShipment(trackingNumber: string): TrackingInfo | null {
    for (const shipment of this.shipments.values()) {
      if (shipment.trackingNumber === trackingNumber) {
        return {
          trackingNumber,
          shipmentId: shipment.shipmentId,
          status: shipment.status,
          lastUpdate: shipment.updatedAt.toISOString(),
        };
      }
    }
    return null;
  }

  cancelShipment(shipmentId: string): boolean {
    const shipment = this.shipments.get(shipmentId);
    if (!shipment || shipment.status === ShipmentStatus.CANCELLED) {
      return false;
    }

    shipment.status = ShipmentStatus.CANCELLED;
    shipment.updatedAt = new Date();
    this.logger.log(`Shipment ${shipment.trackingNumber} cancelled`);
    return true;
  }
}

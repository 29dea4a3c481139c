export enum ShipmentStatus {
  CREATED = 'CREATED',
  CANCELLED = 'CANCELLED',
}

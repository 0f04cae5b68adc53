export interface DeliveryResult {
  delivered: boolean;
  /** True when the provider is not configured and the send was only logged */
  simulated: boolean;
  providerId?: string;
  error?: string;
}

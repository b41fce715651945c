export { KopoKopoService } from './kopokopo.service';
export type { KopoKopoOptions } from './kopokopo.service';
export { PaymentDispatchQueue } from './dispatch.queue';
export type { DispatchQueueOptions } from './dispatch.queue';
export { PaymentReconciler } from './reconciler.service';
export { KOPOKOPO_SIGNATURE_HEADER } from './kopokopo.webhook';

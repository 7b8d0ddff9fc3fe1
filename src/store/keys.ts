/**
 * Store key layout. Every key the service touches is built here so the
 * namespace stays in one place.
 *
 *   {p}{queue}                          durable inbound FIFO (list)
 *   {p}{queue}:processing:{worker}      reserved-but-unacked events of one process (list)
 *   {p}{queue}:workers                  worker heartbeats (sorted set, score = unix seconds)
 *   {p}subject:{id}                     subject hash
 *   {p}subject:blocked                  blocked subjects (set)
 *   {p}followup:due                     due index (sorted set, score = unix seconds)
 *   {p}payment:{id}                     pending payment record (hash)
 *   {p}payment:error:{id}               last checkout failure (hash)
 *   {p}payment:pending                  subjects awaiting confirmation (set)
 *   {p}payment:idmap                    external identifier -> subject (hash)
 *   {p}retry                            retry items (list)
 *   {p}delivery:{id}                    delivery record (hash)
 *   {p}access:{key}                     access key -> subject (hash)
 *   {p}funnel:events                    capped event log (list)
 *   {p}funnel:counters                  global counters (hash)
 *   {p}funnel:day:{yyyy-mm-dd}          per-day counters (hash)
 *   {p}funnel:days                      per-day counter keys written so far (set)
 *   {p}campaign:{token}                 campaign parameters behind a /start token (hash)
 */

export interface StoreKeys {
  queue: string;
  processing(workerId: string): string;
  workers: string;
  subject(id: string): string;
  blocked: string;
  followupDue: string;
  payment(id: string): string;
  paymentError(id: string): string;
  paymentPending: string;
  identifierMap: string;
  retry: string;
  delivery(id: string): string;
  accessKey(key: string): string;
  funnelEvents: string;
  funnelCounters: string;
  funnelDay(day: string): string;
  funnelDays: string;
  campaign(token: string): string;
}

export function createKeys(prefix: string, queueName: string): StoreKeys {
  const k = (suffix: string) => `${prefix}${suffix}`;
  return {
    queue: k(queueName),
    processing: (workerId) => k(`${queueName}:processing:${workerId}`),
    workers: k(`${queueName}:workers`),
    subject: (id) => k(`subject:${id}`),
    blocked: k("subject:blocked"),
    followupDue: k("followup:due"),
    payment: (id) => k(`payment:${id}`),
    paymentError: (id) => k(`payment:error:${id}`),
    paymentPending: k("payment:pending"),
    identifierMap: k("payment:idmap"),
    retry: k("retry"),
    delivery: (id) => k(`delivery:${id}`),
    accessKey: (key) => k(`access:${key}`),
    funnelEvents: k("funnel:events"),
    funnelCounters: k("funnel:counters"),
    funnelDay: (day) => k(`funnel:day:${day}`),
    funnelDays: k("funnel:days"),
    campaign: (token) => k(`campaign:${token}`)
  };
}

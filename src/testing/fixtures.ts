import type { NewAlertEvent } from "@/src/alerts/repository";
import { validateNewSubscription, type NewSubscriptionInput } from "@/src/alerts/subscription";
import type { AlertEvent, Subscription } from "@/src/alerts/types";

// Fort Kochi jetty and a point roughly 1.1 km north of it.
export const JETTY = { latitude: 9.9658, longitude: 76.2421 };
export const NEARBY = { latitude: 9.9758, longitude: 76.2421 };
export const FAR_AWAY = { latitude: 10.5276, longitude: 76.2144 }; // ~63 km

export function subscriptionInput(overrides: Partial<NewSubscriptionInput> = {}): NewSubscriptionInput {
  return {
    user_id: "user-buyer",
    phone: "919800000001",
    name: "Home",
    ...JETTY,
    radius_km: 5,
    alert_frequency: "immediate",
    ...overrides,
  };
}

export function makeSubscription(overrides: Partial<Subscription> = {}): Subscription {
  return {
    ...validateNewSubscription(subscriptionInput()),
    id: "sub-1",
    is_active: true,
    is_paused: false,
    paused_until: null,
    alerts_received: 0,
    alerts_clicked: 0,
    last_alert_at: null,
    created_at: "2026-03-01T00:00:00.000Z",
    ...overrides,
  };
}

export function eventInput(overrides: Partial<NewAlertEvent> = {}): NewAlertEvent {
  return {
    kind: "new_catch",
    type_id: "fish-sardine",
    source_id: "seller-1",
    source_user_id: "user-seller",
    source_name: "Jetty Fresh",
    ...NEARBY,
    title: "Sardine",
    details: null,
    price: 180,
    media_id: null,
    ...overrides,
  };
}

export function makeEvent(overrides: Partial<AlertEvent> = {}): AlertEvent {
  return {
    ...eventInput(),
    id: "evt-1",
    is_active: true,
    alerts_sent: 0,
    coming_count: 0,
    message_count: 0,
    created_at: "2026-03-10T04:00:00.000Z",
    ...overrides,
  };
}

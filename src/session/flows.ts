/**
 * Flow and step catalogue for the chat state machine.
 *
 * A step tag is only meaningful inside its flow; `IDLE_STEPS` are the
 * positions where no input is pending, whatever the flow says.
 */

export const FLOW_STEPS = {
  main_menu: ["idle", "main_menu", "show_menu"],
  fish_subscribe: ["awaiting_location", "awaiting_radius", "awaiting_frequency"],
  fish_manage_subscription: ["awaiting_action", "awaiting_frequency"],
  fish_post_catch: ["awaiting_fish_type", "awaiting_price", "awaiting_photo", "awaiting_location"],
  settings: ["awaiting_language"],
  fish_seller_register: ["awaiting_business_name", "awaiting_location"],
} as const;

export type FlowType = keyof typeof FLOW_STEPS;

export const IDLE_STEPS: readonly string[] = ["idle", "main_menu", "show_menu"];

export function isFlowType(value: string): value is FlowType {
  return Object.prototype.hasOwnProperty.call(FLOW_STEPS, value);
}

export function initialStep(flow: FlowType): string {
  return FLOW_STEPS[flow][0];
}

/**
 * Inactivity timeout per flow, in minutes. The main menu uses the
 * configured fallback.
 */
export function flowTimeoutMinutes(flow: FlowType, fallbackMinutes: number): number {
  switch (flow) {
    case "main_menu":
      return fallbackMinutes;
    case "fish_subscribe":
    case "fish_manage_subscription":
    case "fish_post_catch":
    case "settings":
    case "fish_seller_register":
      return 15;
  }
}

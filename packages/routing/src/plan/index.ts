export { planRoute, DEFAULT_MAX_STOPS, type PlanRouteOptions } from "./plan-route.js";

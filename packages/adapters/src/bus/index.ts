export { InMemoryBus, type InMemoryBusConfig } from "./InMemoryBus";
export { BusSubscription, type BusSubscriptionConfig } from "./BusSubscription";

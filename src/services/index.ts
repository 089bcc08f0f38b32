import { BroadcastService } from "./broadcastService";
import { IdAllocator } from "./idAllocator";
import { OrderService } from "./orderService";
import { ProductService } from "./productService";
import { PromoService } from "./promoService";
import { StatsService } from "./statsService";
import { KeyValueStore } from "./store";
import { UserService, UserServiceOptions } from "./userService";

export interface Services {
  store: KeyValueStore;
  products: ProductService;
  orders: OrderService;
  users: UserService;
  promos: PromoService;
  stats: StatsService;
  broadcasts: BroadcastService;
}

/**
 * Wire every repository onto one shared store connection
 */
export function createServices(
  store: KeyValueStore,
  options: UserServiceOptions,
): Services {
  const ids = new IdAllocator(store);
  const products = new ProductService(store, ids);
  const users = new UserService(store, options);
  const stats: StatsService = new StatsService(store, {
    products: () => products.list(),
    orders: () => orders.list(),
    users: () => users.list(),
  });
  const orders = new OrderService(store, ids, stats);

  return {
    store,
    products,
    orders,
    users,
    promos: new PromoService(store),
    stats,
    broadcasts: new BroadcastService(users),
  };
}

export { Direction, Order, Sort } from './sort';
export { PageRequest } from './pageable';
export type { Pageable } from './pageable';
export { Page } from './page';

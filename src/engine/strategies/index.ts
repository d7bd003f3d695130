export { first_strategy } from './first-strategy';
export { random_strategy } from './random-strategy';

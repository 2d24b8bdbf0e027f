import { AppContext } from '../../../app';

export interface RouteOptions {
  ctx: AppContext;
}

/**
 * WorkflowSequencer - drives one request through its plan and builds the response
 */

import { v4 as uuidv4 } from 'uuid';
import { createChain, type Chain } from '../chain.js';
import { createContext, type Context } from '../context.js';
import { estimateDelivery, type DeliveryEstimate } from '../pricing/delivery.js';
import { summarize, type Quote } from '../pricing/rules.js';
import type { Logger } from '../logging/logger.js';
import type { OrderRequest, RequestType } from '../requests/schema.js';
import { RequestLifecycle, type RequestState } from './states.js';
import {
  EvaluateRestockStep,
  PriceRequestStep,
  ProcessRestockStep,
  RecordSalesStep,
  ResolveItemsStep,
} from './steps.js';
import type { StepClass, StepMiddleware } from './step.js';
import type {
  LineFailure,
  OrderResponse,
  RequestContext,
  ResponseStatus,
  StepServices,
} from './types.js';

/**
 * A step and the state its success moves the request to
 */
export interface PlanEntry {
  step: StepClass;
  to: RequestState | ((context: Context<RequestContext>) => RequestState);
}

export const PLANS: Readonly<Record<RequestType, readonly PlanEntry[]>> = {
  inquiry: [{ step: ResolveItemsStep, to: 'items_resolved' }],
  quote: [
    { step: ResolveItemsStep, to: 'items_resolved' },
    { step: PriceRequestStep, to: 'priced' },
  ],
  order: [
    { step: ResolveItemsStep, to: 'items_resolved' },
    { step: PriceRequestStep, to: 'priced' },
    { step: RecordSalesStep, to: 'transacted' },
    { step: EvaluateRestockStep, to: 'restock_evaluated' },
    {
      step: ProcessRestockStep,
      to: (context) =>
        (context.get('restocks') ?? []).some((r) => r.approved) ? 'restock_approved' : 'restock_declined',
    },
  ],
};

export interface WorkflowSequencerOptions {
  services: StepServices;
  logger: Logger;
  /** Defaults to the configured middleware registry */
  middlewares?: readonly StepMiddleware[];
}

export class WorkflowSequencer {
  private readonly services: StepServices;
  private readonly logger: Logger;
  private readonly middlewares?: readonly StepMiddleware[];

  constructor(options: WorkflowSequencerOptions) {
    this.services = options.services;
    this.logger = options.logger;
    this.middlewares = options.middlewares;
  }

  /**
   * Run a validated request. Business failures end up in the response;
   * only an illegal lifecycle transition throws.
   */
  async run(request: OrderRequest): Promise<OrderResponse> {
    const requestId = request.id ?? uuidv4();
    const chain = createChain({ id: requestId });
    const context = createContext<RequestContext>({ request, failures: [] });
    const lifecycle = new RequestLifecycle();
    const middlewares = this.middlewares ?? this.services.config.middlewares.registry;

    this.logger.debug('Request received', { requestId, type: request.type, items: request.items.length });

    let failureReason: string | undefined;
    for (const entry of PLANS[request.type]) {
      const step = new entry.step(context, chain, this.services);
      const result = await step.execute(middlewares);
      this.logger.log(result);

      if (result.failed) {
        failureReason = result.reason;
        break;
      }
      if (result.skipped) continue;

      lifecycle.transition(typeof entry.to === 'function' ? entry.to(context) : entry.to);
    }

    lifecycle.transition('responded');

    const response = this.buildResponse(requestId, request, context, lifecycle, chain, failureReason);
    this.logger.info('Request responded', {
      requestId,
      type: request.type,
      status: response.status,
      totalPrice: response.totalPrice,
    });
    return response;
  }

  private buildResponse(
    requestId: string,
    request: OrderRequest,
    context: Context<RequestContext>,
    lifecycle: RequestLifecycle,
    chain: Chain,
    failureReason: string | undefined
  ): OrderResponse {
    const quote = context.get('quote');
    const failures = context.get('failures') ?? [];

    let priced: Quote | undefined;
    let served: number;
    if (request.type === 'order') {
      const sold = context.get('sold') ?? [];
      priced = quote ? summarize(sold.map(({ line }) => line), quote.discountRate) : undefined;
      served = sold.length;
    } else if (request.type === 'quote') {
      priced = quote;
      served = quote?.lines.length ?? 0;
    } else {
      served = context.get('resolved')?.length ?? 0;
    }

    const status = responseStatus(request, served, failureReason);
    const units = priced?.totalUnits ?? 0;
    let deliveryEstimate: DeliveryEstimate | undefined;
    if (request.type !== 'inquiry' && units > 0) {
      deliveryEstimate = estimateDelivery(request.date, units, this.services.config.leadTimes);
    }

    return {
      requestId,
      type: request.type,
      date: request.date,
      status,
      lineItems: priced?.lines ?? [],
      subtotal: priced?.subtotal ?? 0,
      discountRate: priced?.discountRate ?? 0,
      discountAmount: priced?.discountAmount ?? 0,
      totalPrice: priced?.total ?? 0,
      deliveryEstimate,
      availability: request.type === 'inquiry' ? context.get('availability') : undefined,
      restocks: context.get('restocks') ?? [],
      failures,
      failureReason,
      history: [...lifecycle.history],
      steps: chain.steps,
    };
  }
}

function responseStatus(
  request: OrderRequest,
  served: number,
  failureReason: string | undefined
): ResponseStatus {
  if (failureReason !== undefined && served === 0) return 'rejected';
  if (request.items.length === 0) return 'fulfilled';
  if (served === 0) return 'rejected';
  return served === request.items.length ? 'fulfilled' : 'partial';
}

/**
 * Response for a request that never entered the workflow
 */
export function rejectedResponse(
  requestId: string,
  type: RequestType,
  date: string,
  reason: string,
  failures: LineFailure[] = []
): OrderResponse {
  return {
    requestId,
    type,
    date,
    status: 'rejected',
    lineItems: [],
    subtotal: 0,
    discountRate: 0,
    discountAmount: 0,
    totalPrice: 0,
    restocks: [],
    failures,
    failureReason: reason,
    history: ['received', 'responded'],
    steps: [],
  };
}

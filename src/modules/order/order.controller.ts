import type { Request, Response } from "express";

import { asyncHandler } from "@/middlewares/async-handler.middleware";
import { currentUser } from "@/middlewares/auth.middleware";
import { MESSAGES } from "@/constants/app.constants";
import { ApiResponse } from "@/utils/response.utils";
import { zParse } from "@/utils/validators.utils";

import {
  assignCleanerSchema,
  calculateOrderSchema,
  createOrderSchema,
  orderIdParamSchema,
  orderListQuerySchema,
  timeslotsQuerySchema,
  updateOrderStatusSchema,
} from "./order.schema";
import { OrderService } from "./order.service";

export class OrderController {
  private service: OrderService;

  constructor() {
    this.service = new OrderService();
  }

  calculate = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(calculateOrderSchema, req);
    const result = await this.service.calculate(validated.body.items);
    ApiResponse.success(res, result, "Order price calculated");
  });

  createOrder = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = currentUser(req);
    const validated = await zParse(createOrderSchema, req);
    const result = await this.service.createOrder(userId, validated.body);
    ApiResponse.created(res, result, MESSAGES.ORDER.CREATED);
  });

  listMyOrders = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = currentUser(req);
    const validated = await zParse(orderListQuerySchema, req);
    const result = await this.service.listClientOrders(
      userId,
      validated.query
    );
    ApiResponse.paginated(res, result.data, result.pagination);
  });

  getMyOrder = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = currentUser(req);
    const validated = await zParse(orderIdParamSchema, req);
    const result = await this.service.getClientOrder(
      userId,
      validated.params.orderId
    );
    ApiResponse.success(res, result);
  });

  getTimeslots = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(timeslotsQuerySchema, req);
    const result = await this.service.getTimeslots(
      validated.query.date,
      validated.query.durationMinutes
    );
    ApiResponse.success(res, result);
  });

  listOrders = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(orderListQuerySchema, req);
    const result = await this.service.listOrders(validated.query);
    ApiResponse.paginated(res, result.data, result.pagination);
  });

  getOrder = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(orderIdParamSchema, req);
    const result = await this.service.getOrder(validated.params.orderId);
    ApiResponse.success(res, result);
  });

  updateStatus = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(updateOrderStatusSchema, req);
    const result = await this.service.updateStatus(
      validated.params.orderId,
      validated.body
    );
    ApiResponse.success(res, result, "Order status updated");
  });

  assignCleaner = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(assignCleanerSchema, req);
    const result = await this.service.assignCleaner(
      validated.params.orderId,
      validated.body.cleanerId
    );
    ApiResponse.success(res, result, "Cleaner assigned");
  });
}

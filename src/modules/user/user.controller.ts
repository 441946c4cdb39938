// file: src/modules/user/user.controller.ts

import type { Request, Response } from "express";

import { MESSAGES } from "@/constants/app.constants";
import { asyncHandler } from "@/middlewares/async-handler.middleware";
import { currentUser } from "@/middlewares/auth.middleware";
import { ApiResponse } from "@/utils/response.utils";
import { zParse } from "@/utils/validators.utils";

import {
  createCleanerSchema,
  listCleanersSchema,
  updateProfileSchema,
} from "./user.schema";
import { UserService } from "./user.service";

export class UserController {
  private userService: UserService;

  constructor() {
    this.userService = new UserService();
  }

  getProfile = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = currentUser(req);
    const profile = await this.userService.getProfile(userId);
    ApiResponse.success(res, profile, "Profile fetched successfully");
  });

  updateProfile = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = currentUser(req);
    const validated = await zParse(updateProfileSchema, req);
    const profile = await this.userService.updateProfile(
      userId,
      validated.body
    );
    ApiResponse.success(res, profile, MESSAGES.USER.USER_UPDATED);
  });

  createCleaner = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(createCleanerSchema, req);
    const result = await this.userService.createCleaner(validated.body);
    ApiResponse.created(res, result, "Cleaner created successfully");
  });

  listCleaners = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(listCleanersSchema, req);
    const result = await this.userService.listCleaners(validated.query);
    ApiResponse.paginated(res, result.data, result.pagination);
  });
}

import authRouter from "@/modules/auth/auth.route";
import cleaningServiceRouter from "@/modules/cleaning-service/cleaning-service.route";
import orderRouter from "@/modules/order/order.route";
import pricingRouter from "@/modules/pricing/pricing.route";
import userRouter from "@/modules/user/user.route";

import { Router } from "express";

const router = Router();

const moduleRoutes = [
  {
    path: "/auth",
    route: authRouter,
  },
  {
    path: "/users",
    route: userRouter,
  },
  {
    path: "/services",
    route: cleaningServiceRouter,
  },
  {
    path: "/pricing",
    route: pricingRouter,
  },
  {
    path: "/orders",
    route: orderRouter,
  },
];

moduleRoutes.forEach((route) => router.use(route.path, route.route));

export default router;

import { router } from "./_core/trpc";
import { portfolioRouter } from "./portfolio/portfolioRouter";

export const appRouter = router({
  portfolio: portfolioRouter,
});

export type AppRouter = typeof appRouter;

import { cva, type VariantProps } from "class-variance-authority";
import type { HTMLAttributes } from "react";
import { cn } from "../../lib/utils";

const badgeVariants = cva("pill", {
  variants: {
    variant: {
      live: "status-pill live",
      ended: "status-pill ended",
      reason: "reason",
      chip: "chip",
      subtle: "chip subtle",
    },
  },
  defaultVariants: {
    variant: "chip",
  },
});

export interface BadgeProps extends HTMLAttributes<HTMLSpanElement>, VariantProps<typeof badgeVariants> {}

export function Badge({ className, variant, ...props }: BadgeProps) {
  return <span className={cn(badgeVariants({ variant }), className)} {...props} />;
}

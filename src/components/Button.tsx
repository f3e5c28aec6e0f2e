import type { ButtonHTMLAttributes, ReactNode } from "react";

type ButtonVariant = "primary" | "ghost";

interface ButtonProps extends ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: ButtonVariant;
  icon?: boolean;
  busy?: boolean;
  children: ReactNode;
}

export function Button({
  variant = "ghost",
  icon = false,
  busy = false,
  type = "button",
  children,
  className = "",
  ...props
}: ButtonProps) {
  const classes = [
    "button",
    `button--${variant}`,
    icon && "button--icon",
    busy && "button--busy",
    className,
  ]
    .filter(Boolean)
    .join(" ");

  return (
    <button
      type={type}
      className={classes}
      aria-busy={busy || undefined}
      {...props}
    >
      {children}
    </button>
  );
}

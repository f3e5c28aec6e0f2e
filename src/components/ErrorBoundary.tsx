import type { ErrorInfo, ReactNode } from "react";
import { Component } from "react";
import { Button } from "./Button";

interface ErrorBoundaryProps {
  children: ReactNode;
  title?: string;
  description?: string;
  resetLabel?: string;
  fullScreen?: boolean;
}

interface ErrorBoundaryState {
  hasError: boolean;
  error: Error | null;
}

export class ErrorBoundary extends Component<
  ErrorBoundaryProps,
  ErrorBoundaryState
> {
  state: ErrorBoundaryState = {
    hasError: false,
    error: null,
  };

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { hasError: true, error };
  }

  componentDidCatch(error: Error, info: ErrorInfo) {
    console.error("ErrorBoundary caught error:", error, info.componentStack);
  }

  private handleReset = () => {
    this.setState({ hasError: false, error: null });
  };

  render() {
    const {
      children,
      title = "Something went wrong",
      description,
      resetLabel = "Try again",
      fullScreen = false,
    } = this.props;
    const { hasError, error } = this.state;

    if (!hasError) {
      return children;
    }

    return (
      <div
        className={["error-boundary", fullScreen && "error-boundary--full"]
          .filter(Boolean)
          .join(" ")}
        role="alert"
      >
        <div className="error-boundary__title">{title}</div>
        {description && (
          <div className="error-boundary__description">{description}</div>
        )}
        {error?.message && (
          <div className="error-boundary__error">{error.message}</div>
        )}
        <Button variant="primary" onClick={this.handleReset}>
          {resetLabel}
        </Button>
      </div>
    );
  }
}

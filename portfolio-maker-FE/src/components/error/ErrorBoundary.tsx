import { Component, type ErrorInfo, type ReactNode } from 'react'
import { Button } from '@/components/ui/button'
import { logger } from '@/services/logging/FrontendLogger'

interface Props {
  children: ReactNode
}

interface State {
  error: Error | null
}

/**
 * Catches render errors anywhere below it and offers a retry.
 */
export class ErrorBoundary extends Component<Props, State> {
  state: State = { error: null }

  static getDerivedStateFromError(error: Error): State {
    return { error }
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    logger.error('client', 'render', `React Error: ${error.message}`, {
      error: {
        type: error.name,
        message: error.message,
        stack: error.stack,
      },
      details: {
        componentStack: errorInfo.componentStack,
      },
    })
  }

  handleRetry = () => {
    this.setState({ error: null })
  }

  render() {
    if (!this.state.error) {
      return this.props.children
    }

    return (
      <div className="flex min-h-screen items-center justify-center bg-muted px-4">
        <div className="w-full max-w-md rounded-lg bg-background p-6 shadow-lg">
          <h1 className="mb-2 text-xl font-bold">Something went wrong</h1>
          <p className="mb-4 text-muted-foreground">
            An unexpected error occurred. Your saved portfolio is not affected.
          </p>
          <Button onClick={this.handleRetry}>Try Again</Button>
        </div>
      </div>
    )
  }
}

export default ErrorBoundary

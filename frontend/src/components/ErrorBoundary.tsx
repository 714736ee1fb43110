/**
 * ErrorBoundary — keeps a failing canvas or panel from taking the editor down.
 *
 * The boundary resets itself when `resetKey` changes, so switching tabs
 * gives a crashed view a fresh mount.
 */

import { Component, type ReactNode, type ErrorInfo } from 'react';

interface Props {
    children: ReactNode;
    /** Static fallback, or a render function receiving the error and a retry callback */
    fallback?: ReactNode | ((error: Error, retry: () => void) => ReactNode);
    resetKey?: string;
    onError?: (error: Error, info: ErrorInfo) => void;
}

interface State {
    error: Error | null;
    resetKey: string | undefined;
}

export class ErrorBoundary extends Component<Props, State> {
    constructor(props: Props) {
        super(props);
        this.state = { error: null, resetKey: props.resetKey };
    }

    static getDerivedStateFromError(error: Error): Partial<State> {
        return { error };
    }

    static getDerivedStateFromProps(props: Props, state: State): Partial<State> | null {
        if (props.resetKey !== state.resetKey) {
            return { error: null, resetKey: props.resetKey };
        }
        return null;
    }

    componentDidCatch(error: Error, info: ErrorInfo): void {
        console.error('[ErrorBoundary]', error, info.componentStack);
        this.props.onError?.(error, info);
    }

    private handleRetry = () => {
        this.setState({ error: null });
    };

    render() {
        const { error } = this.state;
        if (!error) return this.props.children;

        const { fallback } = this.props;
        if (typeof fallback === 'function') return fallback(error, this.handleRetry);
        if (fallback) return fallback;

        return (
            <div className="error-boundary">
                <h3 className="error-boundary__title">Something went wrong</h3>
                <p className="error-boundary__message">{error.message || 'An unexpected error occurred'}</p>
                <button className="error-boundary__retry" onClick={this.handleRetry}>
                    Try Again
                </button>
            </div>
        );
    }
}

export default ErrorBoundary;

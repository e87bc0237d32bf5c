/*---------------------------------------------------------------------------------------------
 *  Copyright (C) 2024 Posit Software, PBC. All rights reserved.
 *  Licensed under the Elastic License 2.0. See LICENSE.txt for license information.
 *--------------------------------------------------------------------------------------------*/

import * as React from 'react';
import { logger } from '../../utils/logger';

interface ErrorBoundaryProps {
    children: React.ReactNode;
    fallback?: (error: Error, reset: () => void) => React.ReactNode;
}

interface ErrorBoundaryState {
    error?: Error;
}

/**
 * ErrorBoundary component that catches rendering errors and displays a fallback UI.
 *
 * Keeps a failed browser (bad genome, malformed locus, unreachable track)
 * from blanking the whole page. "Try Again" clears the error and remounts the
 * children.
 *
 * Usage:
 * ```tsx
 * <ErrorBoundary>
 *   <GenomeBrowserView {...config} engine={igvEngine} />
 * </ErrorBoundary>
 * ```
 */
export class ErrorBoundary extends React.Component<ErrorBoundaryProps, ErrorBoundaryState> {
    constructor(props: ErrorBoundaryProps) {
        super(props);
        this.state = {};
    }

    static getDerivedStateFromError(error: Error): ErrorBoundaryState {
        return { error };
    }

    componentDidCatch(error: Error, errorInfo: React.ErrorInfo): void {
        logger.error('Genome browser failed to render', error);
        if (errorInfo.componentStack) {
            logger.debug(`Component stack: ${errorInfo.componentStack}`);
        }
    }

    private handleReset = (): void => {
        this.setState({ error: undefined });
    };

    render(): React.ReactNode {
        const { error } = this.state;
        if (!error) {
            return this.props.children;
        }

        if (this.props.fallback) {
            return this.props.fallback(error, this.handleReset);
        }

        return (
            <div
                role="alert"
                style={{
                    padding: '20px',
                    display: 'flex',
                    flexDirection: 'column',
                    alignItems: 'center',
                    fontFamily: 'sans-serif',
                }}
            >
                <h3 style={{ color: '#b00020', marginBottom: '16px' }}>
                    The genome browser could not be displayed
                </h3>
                <details
                    style={{
                        marginBottom: '16px',
                        maxWidth: '600px',
                        padding: '12px',
                        border: '1px solid #ccc',
                        borderRadius: '4px',
                    }}
                >
                    <summary style={{ cursor: 'pointer', fontWeight: 'bold' }}>
                        Error Details
                    </summary>
                    <pre style={{ margin: 0, fontSize: '12px', overflow: 'auto' }}>
                        {error.message}
                    </pre>
                </details>
                <button
                    onClick={this.handleReset}
                    style={{ padding: '8px 16px', cursor: 'pointer', fontSize: '13px' }}
                >
                    Try Again
                </button>
            </div>
        );
    }
}

import React from 'react';
import NoDataPlaceholder from './NoDataPlaceholder';

interface PlotErrorBoundaryProps {
  title: string;
  // A new value clears a previous failure
  resetKey: unknown;
  children: React.ReactNode;
}

interface PlotErrorBoundaryState {
  error: Error | null;
}

/** Keeps a failing plot from taking the rest of the page down with it. */
class PlotErrorBoundary extends React.Component<PlotErrorBoundaryProps, PlotErrorBoundaryState> {
  state: PlotErrorBoundaryState = { error: null };

  static getDerivedStateFromError(error: Error): PlotErrorBoundaryState {
    return { error };
  }

  componentDidCatch(error: Error) {
    console.error(`[plots] ${this.props.title} failed: ${error.message}`);
  }

  componentDidUpdate(prev: PlotErrorBoundaryProps) {
    if (this.state.error && prev.resetKey !== this.props.resetKey) {
      this.setState({ error: null });
    }
  }

  render() {
    if (this.state.error) {
      return (
        <NoDataPlaceholder
          title={this.props.title}
          message={`Could not draw this plot: ${this.state.error.message}`}
        />
      );
    }
    return this.props.children;
  }
}

export default PlotErrorBoundary;

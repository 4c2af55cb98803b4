import { describe, expect, it } from 'vitest';
import { fireEvent, render, screen } from '@testing-library/react';
import WhatIfCalculator from '../WhatIfCalculator';

describe('WhatIfCalculator', () => {
    it('starts from the default backlog shape', () => {
        render(<WhatIfCalculator />);

        expect(screen.getByTestId('total-effort')).toHaveTextContent('15 hours');
        expect(screen.getByTestId('estimated-days')).toHaveTextContent('3');
    });

    it('recomputes when the inputs change', () => {
        render(<WhatIfCalculator />);

        fireEvent.change(screen.getByLabelText('Number of tasks'), { target: { value: '10' } });

        expect(screen.getByTestId('total-effort')).toHaveTextContent('30 hours');
        expect(screen.getByTestId('estimated-days')).toHaveTextContent('5');
    });

    it('lists the optimization goals', () => {
        render(<WhatIfCalculator />);

        expect(screen.getByText('Deadline Driven')).toBeInTheDocument();
    });
});

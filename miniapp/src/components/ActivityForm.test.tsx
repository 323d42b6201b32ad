import { fireEvent, render, screen, waitFor } from '@testing-library/react';
import { describe, expect, it, vi } from 'vitest';
import ActivityForm from './ActivityForm';

const fillForm = (values: { date: string; start: string; end: string; description: string }) => {
  fireEvent.change(screen.getByLabelText('Date'), { target: { value: values.date } });
  fireEvent.change(screen.getByLabelText('Start'), { target: { value: values.start } });
  fireEvent.change(screen.getByLabelText('End'), { target: { value: values.end } });
  fireEvent.change(screen.getByLabelText('Activity'), { target: { value: values.description } });
};

const inputValue = (label: string): string => {
  const input = screen.getByLabelText(label);
  if (!(input instanceof HTMLInputElement)) {
    throw new Error(`${label} is not an input`);
  }
  return input.value;
};

const submit = () => fireEvent.click(screen.getByRole('button', { name: 'Add activity' }));

describe('ActivityForm', () => {
  it('reports an end time that is not after the start', () => {
    const onSubmit = vi.fn().mockResolvedValue(undefined);
    render(<ActivityForm timeZone="UTC" onSubmit={onSubmit} />);

    fillForm({ date: '2024-01-01', start: '10:00', end: '09:00', description: 'Backwards' });
    submit();

    expect(screen.getByRole('alert').textContent).toBe('End 09:00:00 must be after start 10:00:00');
    expect(onSubmit).not.toHaveBeenCalled();
  });

  it('reports the first empty field', () => {
    const onSubmit = vi.fn().mockResolvedValue(undefined);
    render(<ActivityForm timeZone="UTC" onSubmit={onSubmit} />);

    fillForm({ date: '2024-01-01', start: '10:00', end: '11:00', description: '   ' });
    submit();

    expect(screen.getByRole('alert').textContent).toBe('Activity is empty');
    expect(onSubmit).not.toHaveBeenCalled();
  });

  it('submits a normalized draft and starts the next one where it ended', async () => {
    const onSubmit = vi.fn().mockResolvedValue(undefined);
    render(<ActivityForm timeZone="UTC" onSubmit={onSubmit} />);

    fillForm({ date: '2024-01-01', start: '08:00', end: '09:00:30', description: ' Briefing ' });
    submit();

    expect(onSubmit).toHaveBeenCalledWith({
      date: '2024-01-01',
      start: '08:00:00',
      end: '09:00:30',
      description: 'Briefing',
    });
    await waitFor(() => {
      expect(inputValue('Activity')).toBe('');
    });
    expect(inputValue('Start')).toBe('09:00:30');
    expect(screen.queryByRole('alert')).toBeNull();
  });

  it('shows the error when saving fails', async () => {
    const onSubmit = vi.fn().mockRejectedValue(new Error('Failed to add activity'));
    render(<ActivityForm timeZone="UTC" onSubmit={onSubmit} />);

    fillForm({ date: '2024-01-01', start: '08:00', end: '09:00', description: 'Briefing' });
    submit();

    await waitFor(() => {
      expect(screen.getByRole('alert').textContent).toBe('Failed to add activity');
    });
    expect(inputValue('Activity')).toBe('Briefing');
  });
});

import { ratePerformance } from '../youtube.scoring';

describe('ratePerformance', () => {
  it.each([
    [150000, 3.5, 2, 'Excellent'],
    [20000, 1.5, 1, 'Good'],
    [5000, 0.8, 1, 'Average'],
    [500, 0.2, 0.5, 'Needs Improvement'],
  ])('rates %d views, %d%% engagement, %d uploads/week', (views, engagement, uploads, expected) => {
    expect(ratePerformance(views, engagement, uploads)).toBe(expected);
  });
});

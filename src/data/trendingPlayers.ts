import type { TrendingPlayer } from '../types';

// Lista curada à mão; não vem de nenhum provedor.
export const TRENDING_PLAYERS: readonly TrendingPlayer[] = [
  { name: 'Virat Kohli', country: 'India', handle: 'imVkohli', image: 'https://pbs.twimg.com/profile_images/1390384696942200832/0B8zW0gq_400x400.jpg' },
  { name: 'Joe Root', country: 'England', handle: 'root66', image: 'https://pbs.twimg.com/profile_images/1334100239247923202/0YfYxQyW_400x400.jpg' },
  { name: 'Babar Azam', country: 'Pakistan', handle: 'babarazam258', image: 'https://pbs.twimg.com/profile_images/1674019404247615488/1jWkQd2w_400x400.jpg' },
  { name: 'Kane Williamson', country: 'New Zealand', handle: '', image: '' },
  { name: 'Pat Cummins', country: 'Australia', handle: 'patcummins30', image: '' }
];

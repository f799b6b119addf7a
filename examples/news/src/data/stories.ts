export interface Story {
  id: string;
  title: string;
  summary: string;
  body: string;
  author: string;
  publishedAt: string;
}

const stories: Story[] = [
  {
    id: "1",
    title: "Night market reopens on the river front",
    summary: "Forty stalls return after the winter break.",
    body: "The night market reopened on Friday with forty stalls and a new lighting scheme.\n\nOrganisers expect the season to run until October.",
    author: "Mara Quill",
    publishedAt: "2026-03-02",
  },
  {
    id: "2",
    title: "Library extends weekend hours",
    summary: "Branches stay open until eight on Saturdays.",
    body: "All three branches now close at eight on Saturdays.\n\nThe change follows a survey of more than two thousand members.",
    author: "Tobias Wren",
    publishedAt: "2026-03-05",
  },
  {
    id: "3",
    title: "Cycle lane on Harbour Road finished",
    summary: "The two-kilometre lane links the ferry and the station.",
    body: "Work on the Harbour Road cycle lane finished a week ahead of schedule.\n\nThe lane links the ferry terminal with the central station.",
    author: "Ines Calder",
    publishedAt: "2026-03-09",
  },
  {
    id: "4",
    title: "Community orchard plants its hundredth tree",
    summary: "Volunteers mark the milestone with an open day.",
    body: "The orchard on Elm Street planted its hundredth tree this weekend.\n\nAn open day is planned for the first harvest.",
    author: "Mara Quill",
    publishedAt: "2026-03-12",
  },
];

/** Simulated round trip to a backing service. */
export const LATENCY_MS = 20;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function listStories(): Promise<Story[]> {
  await delay(LATENCY_MS);
  return [...stories].sort((a, b) => b.publishedAt.localeCompare(a.publishedAt));
}

export async function getStory(id: string): Promise<Story | undefined> {
  await delay(LATENCY_MS);
  return stories.find((story) => story.id === id);
}

/** Story URLs of the previous site looked like /stories/story-3. */
export function legacyStoryId(id: string): string | null {
  const match = /^story-(\d+)$/.exec(id);
  return match ? match[1] : null;
}

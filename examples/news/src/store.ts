import type { Reducer, Thunk } from "hearthjs-shared";
import { getStory, listStories } from "./data/stories.js";
import type { Story } from "./data/stories.js";

export interface NewsState {
  stories: Record<string, Story>;
  /** Front page order; empty until the list has been loaded. */
  topIds: string[];
}

export type NewsAction =
  | { type: "stories/top-loaded"; stories: Story[] }
  | { type: "stories/story-loaded"; story: Story };

const initialState: NewsState = { stories: {}, topIds: [] };

export const reducer: Reducer<NewsState, NewsAction> = (state = initialState, action) => {
  switch (action.type) {
    case "stories/top-loaded": {
      const stories = { ...state.stories };
      for (const story of action.stories) stories[story.id] = story;
      return { stories, topIds: action.stories.map((story) => story.id) };
    }
    case "stories/story-loaded":
      return { ...state, stories: { ...state.stories, [action.story.id]: action.story } };
    default:
      return state;
  }
};

export function fetchTopStories(): Thunk<NewsState, NewsAction, Promise<void>> {
  return async (dispatch, getState) => {
    if (getState().topIds.length > 0) return;
    const stories = await listStories();
    dispatch({ type: "stories/top-loaded", stories });
  };
}

/** Resolves to whether the story exists. */
export function fetchStory(id: string): Thunk<NewsState, NewsAction, Promise<boolean>> {
  return async (dispatch, getState) => {
    if (getState().stories[id]) return true;
    const story = await getStory(id);
    if (!story) return false;
    dispatch({ type: "stories/story-loaded", story });
    return true;
  };
}

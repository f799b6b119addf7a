import type { HearthApp } from "hearthjs-shared";
import type { HearthComponent } from "hearthjs-adapter-react";
import { legacyStoryId } from "./data/stories.js";
import { firstVisit, responseTime } from "./middleware.js";
import { fetchStory, fetchTopStories, reducer } from "./store.js";
import type { NewsAction, NewsState } from "./store.js";
import About from "./pages/About.js";
import Home from "./pages/Home.js";
import Layout from "./pages/Layout.js";
import NotFound from "./pages/NotFound.js";
import OldAbout from "./pages/OldAbout.js";
import StoryPage from "./pages/Story.js";

function movedPermanently(location: string): Response {
  return new Response(null, { status: 301, headers: { Location: location } });
}

const app: HearthApp<HearthComponent, NewsState, NewsAction> = {
  reducer,
  middleware: [responseTime, firstVisit],
  routes: [
    {
      component: Layout,
      routes: [
        {
          path: "/",
          exact: true,
          component: Home,
          loadData: ({ store }) => store.dispatch(fetchTopStories()),
        },
        {
          path: "/stories/:id",
          component: StoryPage,
          loadData: async ({ store, params }) => {
            if (await store.dispatch(fetchStory(params.id))) return;
            const legacy = legacyStoryId(params.id);
            if (legacy) return movedPermanently(`/stories/${legacy}`);
          },
        },
        { path: "/about", component: About },
        { path: "/old-about", component: OldAbout },
        { component: NotFound },
      ],
    },
  ],
};

export default app;

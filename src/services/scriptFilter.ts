// src/services/scriptFilter.ts
// Alfred script-filter JSON, shown while the user is still typing.
import type { CalendarApp } from "../types/events.js";
import { appName } from "./render/index.js";

export type AlfredItem = {
  uid: string;
  title: string;
  subtitle: string;
  arg: string;
  valid: boolean;
  icon: { path: string };
};

const MIN_QUERY_LENGTH = 3;

const ICON = { path: "icon.png" };

export function buildScriptFilterItems(query: string, app: CalendarApp): { items: AlfredItem[] } {
  const text = query.trim();

  if (text.length < MIN_QUERY_LENGTH) {
    return {
      items: [
        {
          uid: "help",
          title: "Enter your event description...",
          subtitle: "e.g. 'Lunch with Anna tomorrow at noon' or 'Conference 24-30 August'",
          arg: "",
          valid: false,
          icon: ICON,
        },
      ],
    };
  }

  return {
    items: [
      {
        uid: "create_event",
        title: `Create Event: ${text}`,
        subtitle: `Press Enter to add it to ${appName(app)}`,
        arg: text,
        valid: true,
        icon: ICON,
      },
      {
        uid: "preview",
        title: app === "fantastical" ? "Sent to Fantastical as a full sentence" : "Sent to Apple Calendar as structured fields",
        subtitle: "Dates and times are resolved before the event is created",
        arg: "",
        valid: false,
        icon: ICON,
      },
    ],
  };
}

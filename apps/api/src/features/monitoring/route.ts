import {
  EventCreateRequestSchema,
  MetricCreateRequestSchema,
  PreferencesUpdateRequestSchema
} from "@app-monitor/contracts";
import type { Express } from "express";
import type { AppContext } from "../../context.js";
import { actorRoute, parseOrReply } from "../../http.js";
import { toDashboard, toMetric, toPreferences, toSystemEvent } from "../../presenters.js";

export function registerMonitoringRoutes(app: Express, context: AppContext): void {
  const { monitoring } = context.services;

  app.get(
    "/v1/preferences",
    actorRoute(context, async ({ response, actor }) => {
      response.status(200).json(toPreferences(await monitoring.getPreferences(actor)));
    })
  );

  app.put(
    "/v1/preferences",
    actorRoute(context, async ({ request, response, actor }) => {
      const body = parseOrReply(request.body, PreferencesUpdateRequestSchema, response);
      if (!body) {
        return;
      }

      response.status(200).json(toPreferences(await monitoring.updatePreferences(actor, body)));
    })
  );

  app.get(
    "/v1/metrics",
    actorRoute(context, async ({ response, actor }) => {
      const metrics = await monitoring.listMetrics(actor);
      response.status(200).json({ items: metrics.map(toMetric) });
    })
  );

  app.post(
    "/v1/metrics",
    actorRoute(context, async ({ request, response, actor, now }) => {
      const body = parseOrReply(request.body, MetricCreateRequestSchema, response);
      if (!body) {
        return;
      }

      response.status(201).json(toMetric(await monitoring.recordMetric(actor, body, now)));
    })
  );

  app.get(
    "/v1/events",
    actorRoute(context, async ({ response, actor }) => {
      const events = await monitoring.listEvents(actor);
      response.status(200).json({ items: events.map(toSystemEvent) });
    })
  );

  app.post(
    "/v1/events",
    actorRoute(context, async ({ request, response, actor, now }) => {
      const body = parseOrReply(request.body, EventCreateRequestSchema, response);
      if (!body) {
        return;
      }

      response.status(201).json(toSystemEvent(await monitoring.recordEvent(actor, body, now)));
    })
  );

  app.get(
    "/v1/dashboard",
    actorRoute(context, async ({ response, actor, now }) => {
      response.status(200).json(toDashboard(await monitoring.getDashboard(actor, now)));
    })
  );
}

import type { ArticleView, NewsletterView } from "../content/content-service.js";
import type { ContentDetail, ContentListItem } from "../content/content-queries.js";
import type { JournalistSummary, Publisher } from "../org/profile-repository.js";

/** List row of an article or newsletter. */
export function contentRow(item: ContentListItem) {
  return {
    id: item.id,
    title: item.title,
    journalist_name: item.journalistName,
    publisher_name: item.publisherName,
    created_at: new Date(item.createdAt).toISOString(),
  };
}

export function contentDetail(detail: ContentDetail) {
  return {
    id: detail.id,
    title: detail.title,
    content: detail.content,
    journalist: {
      id: detail.journalist.id,
      name: detail.journalist.name,
      username: detail.journalist.username,
      publisher_name: detail.journalist.publisherName,
    },
    publisher: { id: detail.publisher.id, name: detail.publisher.name },
    created_at: new Date(detail.createdAt).toISOString(),
    updated_at: new Date(detail.updatedAt).toISOString(),
  };
}

export function articleDetail(view: ArticleView) {
  return {
    ...contentDetail(view),
    status: view.status,
    ...(view.subscription
      ? {
          subscribed_to_journalist: view.subscription.subscribedToJournalist,
          subscribed_to_publisher: view.subscription.subscribedToPublisher,
        }
      : {}),
  };
}

export function newsletterDetail(view: NewsletterView) {
  return {
    ...contentDetail(view),
    can_edit: view.canEdit,
    ...(view.subscription
      ? {
          subscribed_to_journalist: view.subscription.subscribedToJournalist,
          subscribed_to_publisher: view.subscription.subscribedToPublisher,
        }
      : {}),
  };
}

export function publisherRow(publisher: Publisher) {
  return { id: publisher.id, name: publisher.name };
}

export function journalistRow(journalist: JournalistSummary) {
  return {
    id: journalist.id,
    name: journalist.name,
    username: journalist.username,
    publisher_name: journalist.publisherName,
  };
}

import type { MindMap, MindMapEdge, MindMapNode } from "@quire/types";
import { truncateText } from "./text-utils.js";

const ROOT_ID = "root";
const ROOT_LABEL_CHARS = 30;
const TOPIC_LABEL_CHARS = 20;
const POINT_LABEL_CHARS = 25;

/**
 * Three-level graph: the title at the root, topics beneath it, and key points
 * spread evenly across the topics in order. With no topics the points hang
 * off the root. Blank entries are skipped but keep their index in the id.
 */
export function buildMindMap(
  title: string,
  topics: readonly string[],
  keyPoints: readonly string[],
): MindMap {
  const nodes: MindMapNode[] = [
    {
      id: ROOT_ID,
      label: truncateText(title, ROOT_LABEL_CHARS),
      title,
      level: 0,
      parentId: null,
    },
  ];
  const edges: MindMapEdge[] = [];

  const topicIds: string[] = [];
  topics.forEach((topic, i) => {
    if (!topic.trim()) return;
    const id = `topic_${String(i)}`;
    topicIds.push(id);
    nodes.push({
      id,
      label: truncateText(topic, TOPIC_LABEL_CHARS),
      title: topic,
      level: 1,
      parentId: ROOT_ID,
    });
    edges.push({ from: ROOT_ID, to: id });
  });

  const pointsPerTopic = Math.max(1, Math.floor(keyPoints.length / Math.max(1, topicIds.length)));

  keyPoints.forEach((point, i) => {
    if (!point.trim()) return;
    const id = `point_${String(i)}`;
    const parentId =
      topicIds.length > 0
        ? (topicIds[Math.min(Math.floor(i / pointsPerTopic), topicIds.length - 1)] ?? ROOT_ID)
        : ROOT_ID;
    nodes.push({
      id,
      label: truncateText(point, POINT_LABEL_CHARS),
      title: point,
      level: 2,
      parentId,
    });
    edges.push({ from: parentId, to: id });
  });

  return { root: title, nodes, edges };
}

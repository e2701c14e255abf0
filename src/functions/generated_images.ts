import type { FunctionDescriptor } from "../types.ts";
import type { FunctionHandler } from "../registry.ts";
import { relPath } from "./shared.ts";

export const listGeneratedImagesDescriptor: FunctionDescriptor = {
  name: "list_generated_images",
  description: "List every image generated so far, newest first",
  parameters: [],
};

export const clearGeneratedImagesDescriptor: FunctionDescriptor = {
  name: "clear_generated_images",
  description: "Delete all generated images and return how many were removed",
  parameters: [],
};

export const listGeneratedImages: FunctionHandler = async (_args, { resources }) => {
  const images = await resources.listImages();
  return images.map((image) => relPath(image.path));
};

export const clearGeneratedImages: FunctionHandler = async (_args, { resources }) => {
  return resources.cleanup(0, ["svg", "png"]);
};

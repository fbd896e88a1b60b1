import { Command } from "commander";
import chalk from "chalk";
import { getApiClient } from "../api/client.js";
import { TagType } from "@sdn-port-manager/shared";
import { formatTag, parseTagType, parseTagValue } from "./format.js";

interface TagOptions {
  type: string;
}

export function registerTagsCommand(program: Command): void {
  const tags = program
    .command("tags")
    .alias("t")
    .description("Manage the tags available on an interface");

  // Pool summary
  tags
    .command("summary <interfaceId>")
    .description("Show how many tags are still available")
    .action(async (interfaceId: string) => {
      try {
        const api = getApiClient();
        const summary = await api.getTagSummary(interfaceId);
        console.log(`${chalk.bold(summary.interfaceId)}: ${summary.available} tag(s) available`);
      } catch (error) {
        console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  // Check availability
  tags
    .command("check <interfaceId> <value>")
    .description("Check whether a tag is available")
    .option("-t, --type <type>", "Tag type (vlan, vlan_qinq, mpls)", "vlan")
    .action(async (interfaceId: string, value: string, options: TagOptions) => {
      try {
        const api = getApiClient();
        const tagType = parseTagType(options.type);
        const tag = { tag_type: tagType, value: parseTagValue(value, tagType) };
        const available = await api.isTagAvailable(interfaceId, tag.tag_type, tag.value);
        if (available) {
          console.log(chalk.green(`✓ ${formatTag(tag)} is available`));
        } else {
          console.log(chalk.yellow(`○ ${formatTag(tag)} is in use`));
        }
      } catch (error) {
        console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  // Allocate next tag
  tags
    .command("allocate <interfaceId>")
    .description("Allocate the next available tag")
    .action(async (interfaceId: string) => {
      try {
        const api = getApiClient();
        const tag = await api.allocateTag(interfaceId);
        console.log(chalk.green(`✓ Allocated ${formatTag(tag)}`));
      } catch (error) {
        console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  // Reserve a tag
  tags
    .command("reserve <interfaceId> <value>")
    .description("Reserve a specific tag")
    .option("-t, --type <type>", "Tag type (vlan, vlan_qinq, mpls)", "vlan")
    .action(async (interfaceId: string, value: string, options: TagOptions) => {
      try {
        const api = getApiClient();
        const tagType = parseTagType(options.type);
        const tag = await api.reserveTag(interfaceId, {
          tag_type: tagType,
          value: parseTagValue(value, tagType),
        });
        console.log(chalk.green(`✓ Reserved ${formatTag(tag)}`));
      } catch (error) {
        console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  // Release a tag
  tags
    .command("release <interfaceId> <value>")
    .description("Return a tag to the pool")
    .option("-t, --type <type>", "Tag type (vlan, vlan_qinq, mpls)", "vlan")
    .action(async (interfaceId: string, value: string, options: TagOptions) => {
      try {
        const api = getApiClient();
        const tagType = parseTagType(options.type);
        const tag = await api.releaseTag(interfaceId, {
          tag_type: tagType,
          value: parseTagValue(value, tagType),
        });
        console.log(chalk.green(`✓ Released ${formatTag(tag)}`));
      } catch (error) {
        console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  // Provision a UNI
  tags
    .command("uni <interfaceId> [value]")
    .description("Provision a UNI, reserving the given VLAN or the next free one")
    .action(async (interfaceId: string, value?: string) => {
      try {
        const api = getApiClient();
        const requested =
          value === undefined
            ? undefined
            : { tag_type: TagType.VLAN, value: parseTagValue(value, TagType.VLAN) };
        const uni = await api.provisionUni(interfaceId, requested);
        console.log(chalk.green(`✓ UNI on ${uni.interface_id} with ${formatTag(uni.user_tag)}`));
      } catch (error) {
        console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}

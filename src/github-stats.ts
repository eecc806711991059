import { graphql, GraphqlResponseError } from '@octokit/graphql'
import { z } from 'zod'
import type { GitHubUserStats } from './types.ts'
import { debug } from './log.ts'

type QueryVariables = NonNullable<Parameters<typeof graphql>[1]>

/** The slice of the octokit graphql client this module calls */
type GraphqlClient = (query: string, variables: QueryVariables) => Promise<unknown>

let octokit: GraphqlClient | null = null

function getOctokit(): GraphqlClient {
  if (!octokit) {
    const token = process.env.GITHUB_TOKEN
    if (!token) throw new Error('GITHUB_TOKEN is not set; add it to the environment or .env')

    octokit = graphql.defaults({
      headers: {
        authorization: `Bearer ${token}`,
      },
    })
  }
  return octokit
}

// Replaces the API client, e.g. with an in-process fake
function setOctokitClient(client: GraphqlClient | null): void {
  octokit = client
}

type RetryOptions = {
  retries?: number
  /** Delay before the first retry in ms */
  initialBackoff?: number
  metricName?: string
}

// Wrapper for octokit with retry logic and rate limit handling
async function safeOctokit(
  query: string,
  variables: QueryVariables,
  { retries = 5, initialBackoff = 2000, metricName = 'Unknown' }: RetryOptions = {},
): Promise<unknown> {
  // A missing token is not retried
  const client = getOctokit()
  let currentRetry = 0

  while (true) {
    try {
      debug(`Request starting: ${metricName}`)
      const result = await client(query, variables)
      debug(`Request succeeded: ${metricName}`)
      return result
    } catch (error) {
      debug(`Request failed: ${metricName}`)

      const isGraphqlError = error instanceof GraphqlResponseError
      const isRateLimit = isGraphqlError && error.message.includes('rate limit')

      if (currentRetry >= retries) throw error
      currentRetry++

      // Exponential backoff with jitter
      const jitter = Math.random() * initialBackoff / 2
      const waitTime = isRateLimit
        ? Math.max(initialBackoff * 2 ** (currentRetry - 1) + jitter, 60_000) // At least 60s for rate limits
        : initialBackoff * 1.5 ** (currentRetry - 1) + jitter

      console.log(
        `${isGraphqlError ? 'GraphQL error' : 'Error'} for ${metricName}. Retrying in ${
          Math.round(waitTime / 1000)
        }s (attempt ${currentRetry}/${retries})`,
      )

      await new Promise((resolve) => setTimeout(resolve, waitTime))
    }
  }
}

const USER_QUERY = `
  query($login: String!, $from: DateTime!, $to: DateTime!) {
    user(login: $login) {
      login
      followers {
        totalCount
      }
      contributionsCollection(from: $from, to: $to) {
        totalCommitContributions
        restrictedContributionsCount
        totalPullRequestReviewContributions
      }
      repositoriesContributedTo(first: 1, contributionTypes: [COMMIT, ISSUE, PULL_REQUEST, REPOSITORY]) {
        totalCount
      }
      pullRequests(first: 1) {
        totalCount
      }
      mergedPullRequests: pullRequests(states: MERGED) {
        totalCount
      }
      openIssues: issues(states: OPEN) {
        totalCount
      }
      closedIssues: issues(states: CLOSED) {
        totalCount
      }
    }
  }
`

const REPOSITORIES_QUERY = `
  query($login: String!, $cursor: String) {
    user(login: $login) {
      repositories(first: 100, after: $cursor, ownerAffiliations: OWNER, isFork: false) {
        nodes {
          name
          stargazers {
            totalCount
          }
          languages(first: 10, orderBy: { field: SIZE, direction: DESC }) {
            edges {
              size
              node {
                name
              }
            }
          }
        }
        pageInfo {
          hasNextPage
          endCursor
        }
      }
    }
  }
`

const totalCount = z.object({ totalCount: z.number() })

const UserResponseSchema = z.object({
  user: z.object({
    login: z.string(),
    followers: totalCount,
    contributionsCollection: z.object({
      totalCommitContributions: z.number(),
      restrictedContributionsCount: z.number(),
      totalPullRequestReviewContributions: z.number(),
    }),
    repositoriesContributedTo: totalCount,
    pullRequests: totalCount,
    mergedPullRequests: totalCount,
    openIssues: totalCount,
    closedIssues: totalCount,
  }).nullable(),
})

const RepositorySchema = z.object({
  name: z.string(),
  stargazers: totalCount,
  languages: z.object({
    edges: z.array(z.object({ size: z.number(), node: z.object({ name: z.string() }) })),
  }).nullable(),
})

const RepositoriesResponseSchema = z.object({
  user: z.object({
    repositories: z.object({
      nodes: z.array(RepositorySchema),
      pageInfo: z.object({ hasNextPage: z.boolean(), endCursor: z.string().nullable() }),
    }),
  }).nullable(),
})

type Repository = z.infer<typeof RepositorySchema>

function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, metricName: string): T {
  const result = schema.safeParse(data)
  if (!result.success) {
    throw new Error(`Unexpected response for ${metricName}: ${result.error.issues[0]?.message ?? 'invalid shape'}`)
  }
  return result.data
}

async function fetchRepositories(login: string): Promise<Repository[]> {
  const repositories: Repository[] = []
  let cursor: string | null = null
  let page = 0

  while (true) {
    page++
    const metricName = `repositories-page-${page}`
    const data: z.infer<typeof RepositoriesResponseSchema> = parseResponse(
      RepositoriesResponseSchema,
      await safeOctokit(REPOSITORIES_QUERY, { login, cursor }, { metricName }),
      metricName,
    )
    if (!data.user) throw new Error(`GitHub user not found: ${login}`)

    repositories.push(...data.user.repositories.nodes)

    const { hasNextPage, endCursor } = data.user.repositories.pageInfo
    if (!hasNextPage || !endCursor) return repositories
    cursor = endCursor
  }
}

const exponentialCdf = (x: number): number => 1 - 2 ** -x
const logNormalCdf = (x: number): number => x / (1 + x)

const RANK_THRESHOLDS = [1, 12.5, 25, 37.5, 50, 62.5, 75, 87.5, 100]
const RANK_LEVELS = ['S', 'A+', 'A', 'A-', 'B+', 'B', 'B-', 'C+', 'C']

type RankInputs = {
  commits: number
  prs: number
  issues: number
  reviews: number
  stars: number
  followers: number
}

/**
 * Ranks a profile against typical GitHub activity. Each count is mapped
 * through a CDF around its median and weighted; the percentile is the share
 * of users expected to rank higher.
 */
function calculateRank({ commits, prs, issues, reviews, stars, followers }: RankInputs): {
  level: string
  percentile: number
} {
  const weighted = [
    { weight: 2, score: exponentialCdf(commits / 250) },
    { weight: 3, score: exponentialCdf(prs / 50) },
    { weight: 1, score: exponentialCdf(issues / 25) },
    { weight: 1, score: exponentialCdf(reviews / 2) },
    { weight: 4, score: logNormalCdf(stars / 50) },
    { weight: 1, score: logNormalCdf(followers / 10) },
  ]
  const totalWeight = weighted.reduce((sum, { weight }) => sum + weight, 0)
  const rank = 1 - weighted.reduce((sum, { weight, score }) => sum + weight * score, 0) / totalWeight
  const percentile = rank * 100
  const levelIndex = RANK_THRESHOLDS.findIndex((threshold) => percentile <= threshold)

  return { level: RANK_LEVELS[levelIndex === -1 ? RANK_LEVELS.length - 1 : levelIndex], percentile }
}

/**
 * Collects the statistics shown by the fetch summary.
 *
 * @param commitsYear - calendar year the commit count covers (default: last year)
 */
async function fetchGithubStats(
  login: string,
  ignoreRepos: string[] = [],
  commitsYear: number = new Date().getUTCFullYear() - 1,
): Promise<GitHubUserStats> {
  const { user } = parseResponse(
    UserResponseSchema,
    await safeOctokit(
      USER_QUERY,
      { login, from: `${commitsYear}-01-01T00:00:00Z`, to: `${commitsYear}-12-31T23:59:59Z` },
      { metricName: 'user' },
    ),
    'user',
  )
  if (!user) throw new Error(`GitHub user not found: ${login}`)

  const ignored = new Set(ignoreRepos)
  const repositories = (await fetchRepositories(login)).filter((repo) => !ignored.has(repo.name))

  const languageSizes = new Map<string, number>()
  for (const repo of repositories) {
    for (const edge of repo.languages?.edges ?? []) {
      languageSizes.set(edge.node.name, (languageSizes.get(edge.node.name) ?? 0) + edge.size)
    }
  }

  const totalStargazers = repositories.reduce((sum, repo) => sum + repo.stargazers.totalCount, 0)
  const totalCommits = user.contributionsCollection.totalCommitContributions +
    user.contributionsCollection.restrictedContributionsCount
  const totalPullRequests = user.pullRequests.totalCount
  const mergePercentage = totalPullRequests
    ? Math.round(user.mergedPullRequests.totalCount / totalPullRequests * 10_000) / 100
    : 0

  return {
    login: user.login,
    userRank: calculateRank({
      commits: totalCommits,
      prs: totalPullRequests,
      issues: user.openIssues.totalCount + user.closedIssues.totalCount,
      reviews: user.contributionsCollection.totalPullRequestReviewContributions,
      stars: totalStargazers,
      followers: user.followers.totalCount,
    }),
    totalStargazers,
    totalCommitsLastYear: totalCommits,
    commitsYear,
    totalPullRequestsMade: totalPullRequests,
    pullRequestsMergePercentage: mergePercentage,
    totalRepoContributions: user.repositoriesContributedTo.totalCount,
    languagesSorted: [...languageSizes.entries()].sort((a, b) => b[1] - a[1]),
  }
}

export { calculateRank, fetchGithubStats, safeOctokit, setOctokitClient }
export type { GraphqlClient, RankInputs }

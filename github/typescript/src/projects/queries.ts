/**
 * GraphQL documents for the Projects v2 API.
 */

const PROJECT_FIELDS = `
  id
  number
  title
  url
`;

export const VIEWER_PROJECT_QUERY = `
  query ViewerProject($number: Int!) {
    viewer {
      projectV2(number: $number) {${PROJECT_FIELDS}}
    }
  }
`;

export const ORGANIZATION_PROJECT_QUERY = `
  query OrganizationProject($login: String!, $number: Int!) {
    organization(login: $login) {
      projectV2(number: $number) {${PROJECT_FIELDS}}
    }
  }
`;

export const USER_PROJECT_QUERY = `
  query UserProject($login: String!, $number: Int!) {
    user(login: $login) {
      projectV2(number: $number) {${PROJECT_FIELDS}}
    }
  }
`;

export const ORGANIZATION_PROJECTS_QUERY = `
  query OrganizationProjects($login: String!, $search: String!) {
    organization(login: $login) {
      projectsV2(first: 100, query: $search) {
        nodes {${PROJECT_FIELDS}}
      }
    }
  }
`;

export const USER_PROJECTS_QUERY = `
  query UserProjects($login: String!, $search: String!) {
    user(login: $login) {
      projectsV2(first: 100, query: $search) {
        nodes {${PROJECT_FIELDS}}
      }
    }
  }
`;

export const PROJECT_FIELDS_QUERY = `
  query ProjectFields($projectId: ID!) {
    node(id: $projectId) {
      ... on ProjectV2 {
        fields(first: 100) {
          nodes {
            ... on ProjectV2Field {
              id
              name
              dataType
            }
            ... on ProjectV2SingleSelectField {
              id
              name
              dataType
              options {
                id
                name
              }
            }
            ... on ProjectV2IterationField {
              id
              name
              dataType
              configuration {
                iterations {
                  id
                  title
                }
              }
            }
          }
        }
      }
    }
  }
`;

export const ADD_DRAFT_ISSUE_MUTATION = `
  mutation AddDraftIssue($projectId: ID!, $title: String!, $body: String) {
    addProjectV2DraftIssue(input: { projectId: $projectId, title: $title, body: $body }) {
      projectItem {
        id
      }
    }
  }
`;

export const ADD_PROJECT_ITEM_MUTATION = `
  mutation AddProjectItem($projectId: ID!, $contentId: ID!) {
    addProjectV2ItemById(input: { projectId: $projectId, contentId: $contentId }) {
      item {
        id
      }
    }
  }
`;

export const UPDATE_ITEM_FIELD_VALUE_MUTATION = `
  mutation UpdateItemFieldValue(
    $projectId: ID!
    $itemId: ID!
    $fieldId: ID!
    $value: ProjectV2FieldValue!
  ) {
    updateProjectV2ItemFieldValue(
      input: { projectId: $projectId, itemId: $itemId, fieldId: $fieldId, value: $value }
    ) {
      projectV2Item {
        id
      }
    }
  }
`;

export const DELETE_PROJECT_ITEM_MUTATION = `
  mutation DeleteProjectItem($projectId: ID!, $itemId: ID!) {
    deleteProjectV2Item(input: { projectId: $projectId, itemId: $itemId }) {
      deletedItemId
    }
  }
`;

export const CREATE_PROJECT_MUTATION = `
  mutation CreateProject($ownerId: ID!, $title: String!) {
    createProjectV2(input: { ownerId: $ownerId, title: $title }) {
      projectV2 {${PROJECT_FIELDS}}
    }
  }
`;

export const UPDATE_PROJECT_DESCRIPTION_MUTATION = `
  mutation UpdateProjectDescription($projectId: ID!, $description: String!) {
    updateProjectV2(input: { projectId: $projectId, shortDescription: $description }) {
      projectV2 {
        id
      }
    }
  }
`;

export const DELETE_PROJECT_MUTATION = `
  mutation DeleteProject($projectId: ID!) {
    deleteProjectV2(input: { projectId: $projectId }) {
      projectV2 {
        id
      }
    }
  }
`;
